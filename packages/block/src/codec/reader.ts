import { MalformedBlockError } from '@blockquery/utils'
import { VARINT_UINT16, VARINT_UINT32 } from '../constants'

/**
 * Cursor over a byte buffer. Every read checks the remaining length first and
 * throws a {@link MalformedBlockError} instead of reading past the end.
 */
export class ByteReader {
  private readonly view: DataView
  private position = 0

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get offset(): number {
    return this.position
  }

  get remaining(): number {
    return this.bytes.length - this.position
  }

  get length(): number {
    return this.bytes.length
  }

  private ensure(size: number, what: string): void {
    if (size > this.remaining) {
      throw new MalformedBlockError(
        `Unexpected end of data reading ${what}: need ${size} bytes at offset ${this.position}, ${this.remaining} left`,
        { context: { offset: this.position } },
      )
    }
  }

  peekUInt8(ahead = 0): number | undefined {
    const at = this.position + ahead
    return at < this.bytes.length ? this.bytes[at] : undefined
  }

  readUInt8(what = 'uint8'): number {
    this.ensure(1, what)
    const value = this.view.getUint8(this.position)
    this.position += 1
    return value
  }

  readUInt16(what = 'uint16'): number {
    this.ensure(2, what)
    const value = this.view.getUint16(this.position, true)
    this.position += 2
    return value
  }

  readUInt32(what = 'uint32'): number {
    this.ensure(4, what)
    const value = this.view.getUint32(this.position, true)
    this.position += 4
    return value
  }

  readInt32(what = 'int32'): number {
    this.ensure(4, what)
    const value = this.view.getInt32(this.position, true)
    this.position += 4
    return value
  }

  readUInt64(what = 'uint64'): bigint {
    this.ensure(8, what)
    const value = this.view.getBigUint64(this.position, true)
    this.position += 8
    return value
  }

  /**
   * Returns a copy, so decoded records never alias the input buffer. A Buffer
   * input's slice() would share memory, hence the explicit copy.
   */
  readBytes(size: number, what = 'bytes'): Uint8Array {
    this.ensure(size, what)
    const value = new Uint8Array(
      this.bytes.subarray(this.position, this.position + size),
    )
    this.position += size
    return value
  }

  /**
   * Bitcoin CompactSize integer: 1, 3, 5 or 9 bytes.
   */
  readVarInt(what = 'varint'): number {
    const first = this.readUInt8(what)
    let value: number | bigint
    if (first < VARINT_UINT16) {
      value = first
    } else if (first === VARINT_UINT16) {
      value = this.readUInt16(what)
    } else if (first === VARINT_UINT32) {
      value = this.readUInt32(what)
    } else {
      value = this.readUInt64(what)
    }
    if (typeof value === 'bigint') {
      if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new MalformedBlockError(
          `${what} of ${value} does not fit a safe integer`,
          { context: { offset: this.position } },
        )
      }
      return Number(value)
    }
    return value
  }

  /**
   * Reads a length-prefixed byte string (scripts, witness items).
   */
  readVarBytes(what = 'script'): Uint8Array {
    const size = this.readVarInt(`${what} length`)
    if (size > this.remaining) {
      throw new MalformedBlockError(
        `${what} length ${size} exceeds the ${this.remaining} bytes left at offset ${this.position}`,
        { context: { offset: this.position } },
      )
    }
    return this.readBytes(size, what)
  }

  /**
   * Reads a count and rejects it when even the smallest possible items could
   * not fit in the remaining bytes.
   */
  readCount(minItemSize: number, what: string): number {
    const count = this.readVarInt(`${what} count`)
    if (count * minItemSize > this.remaining) {
      throw new MalformedBlockError(
        `${what} count ${count} is inconsistent with the ${this.remaining} bytes left`,
        { context: { offset: this.position } },
      )
    }
    return count
  }

  slice(start: number, end: number): Uint8Array {
    return this.bytes.subarray(start, end)
  }
}
