import { VARINT_UINT16, VARINT_UINT32, VARINT_UINT64 } from '../constants'

const INITIAL_CAPACITY = 256

/**
 * Growable little-endian byte writer, the inverse of {@link ByteReader}.
 */
export class ByteWriter {
  private buffer: Uint8Array
  private view: DataView
  private position = 0

  constructor(capacity = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(capacity)
    this.view = new DataView(this.buffer.buffer)
  }

  private grow(size: number): void {
    const needed = this.position + size
    if (needed <= this.buffer.length) return
    let capacity = this.buffer.length * 2
    while (capacity < needed) capacity *= 2
    const next = new Uint8Array(capacity)
    next.set(this.buffer.subarray(0, this.position))
    this.buffer = next
    this.view = new DataView(next.buffer)
  }

  writeUInt8(value: number): this {
    this.grow(1)
    this.view.setUint8(this.position, value)
    this.position += 1
    return this
  }

  writeUInt16(value: number): this {
    this.grow(2)
    this.view.setUint16(this.position, value, true)
    this.position += 2
    return this
  }

  writeUInt32(value: number): this {
    this.grow(4)
    this.view.setUint32(this.position, value, true)
    this.position += 4
    return this
  }

  writeInt32(value: number): this {
    this.grow(4)
    this.view.setInt32(this.position, value, true)
    this.position += 4
    return this
  }

  writeUInt64(value: bigint): this {
    this.grow(8)
    this.view.setBigUint64(this.position, value, true)
    this.position += 8
    return this
  }

  writeBytes(bytes: Uint8Array): this {
    this.grow(bytes.length)
    this.buffer.set(bytes, this.position)
    this.position += bytes.length
    return this
  }

  writeVarInt(value: number): this {
    if (value < VARINT_UINT16) return this.writeUInt8(value)
    if (value <= 0xffff) return this.writeUInt8(VARINT_UINT16).writeUInt16(value)
    if (value <= 0xffffffff) {
      return this.writeUInt8(VARINT_UINT32).writeUInt32(value)
    }
    return this.writeUInt8(VARINT_UINT64).writeUInt64(BigInt(value))
  }

  writeVarBytes(bytes: Uint8Array): this {
    return this.writeVarInt(bytes.length).writeBytes(bytes)
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.position)
  }
}
