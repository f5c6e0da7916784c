import { ByteWriter } from '../codec/writer'
import { SEGWIT_FLAG, SEGWIT_MARKER } from '../constants'
import type {
  Block,
  BlockHeader,
  EncodeTransactionOptions,
  Transaction,
} from '../types'

/**
 * The fields that make up a transaction's serialization.
 */
export type TransactionBody = Pick<
  Transaction,
  'version' | 'inputs' | 'outputs' | 'lockTime' | 'segwit'
>

export function writeBlockHeader(writer: ByteWriter, header: BlockHeader) {
  writer
    .writeInt32(header.version)
    .writeBytes(header.prevBlockHash)
    .writeBytes(header.merkleRoot)
    .writeUInt32(header.timestamp)
    .writeUInt32(header.bits)
    .writeUInt32(header.nonce)
}

export function writeTransaction(
  writer: ByteWriter,
  tx: TransactionBody,
  opts: EncodeTransactionOptions = {},
) {
  const withWitness = tx.segwit && opts.witness !== false

  writer.writeInt32(tx.version)
  if (withWitness) {
    writer.writeUInt8(SEGWIT_MARKER).writeUInt8(SEGWIT_FLAG)
  }

  writer.writeVarInt(tx.inputs.length)
  for (const input of tx.inputs) {
    writer
      .writeBytes(input.prevTxHash)
      .writeUInt32(input.prevIndex)
      .writeVarBytes(input.script)
      .writeUInt32(input.sequence)
  }

  writer.writeVarInt(tx.outputs.length)
  for (const output of tx.outputs) {
    writer.writeUInt64(output.value).writeVarBytes(output.script)
  }

  if (withWitness) {
    for (const input of tx.inputs) {
      writer.writeVarInt(input.witness.length)
      for (const item of input.witness) {
        writer.writeVarBytes(item)
      }
    }
  }

  writer.writeUInt32(tx.lockTime)
}

export function encodeBlockHeader(header: BlockHeader): Uint8Array {
  const writer = new ByteWriter(80)
  writeBlockHeader(writer, header)
  return writer.toBytes()
}

export function encodeTransaction(
  tx: TransactionBody,
  opts: EncodeTransactionOptions = {},
): Uint8Array {
  const writer = new ByteWriter()
  writeTransaction(writer, tx, opts)
  return writer.toBytes()
}

/**
 * Serializes a block in wire format: header, transaction count, transactions.
 */
export function encodeBlock(
  block: Pick<Block, 'header' | 'transactions'>,
): Uint8Array {
  const writer = new ByteWriter()
  writeBlockHeader(writer, block.header)
  writer.writeVarInt(block.transactions.length)
  for (const tx of block.transactions) {
    writeTransaction(writer, tx)
  }
  return writer.toBytes()
}
