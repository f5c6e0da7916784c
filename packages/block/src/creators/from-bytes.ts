import {
  concatBytes,
  hash256,
  MalformedBlockError,
  toDisplayHash,
} from '@blockquery/utils'
import debugDefault from 'debug'
import { ByteReader } from '../codec/reader'
import {
  BLOCK_HEADER_SIZE,
  MIN_INPUT_SIZE,
  MIN_OUTPUT_SIZE,
  MIN_TX_SIZE,
  SEGWIT_FLAG,
  SEGWIT_MARKER,
} from '../constants'
import type { Block, BlockHeader, Transaction, TxInput, TxOutput } from '../types'

const debug = debugDefault('blockquery:block:codec')

function readBlockHeader(reader: ByteReader): BlockHeader {
  return Object.freeze({
    version: reader.readInt32('header version'),
    prevBlockHash: reader.readBytes(32, 'previous block hash'),
    merkleRoot: reader.readBytes(32, 'merkle root'),
    timestamp: reader.readUInt32('header time'),
    bits: reader.readUInt32('header bits'),
    nonce: reader.readUInt32('header nonce'),
  })
}

function readInput(reader: ByteReader): Omit<TxInput, 'witness'> {
  return {
    prevTxHash: reader.readBytes(32, 'previous tx hash'),
    prevIndex: reader.readUInt32('previous output index'),
    script: reader.readVarBytes('input script'),
    sequence: reader.readUInt32('input sequence'),
  }
}

function readOutput(reader: ByteReader): TxOutput {
  return Object.freeze({
    value: reader.readUInt64('output value'),
    script: reader.readVarBytes('output script'),
  })
}

function readWitness(reader: ByteReader): Uint8Array[] {
  const count = reader.readCount(1, 'witness item')
  const items: Uint8Array[] = []
  for (let i = 0; i < count; i++) {
    items.push(reader.readVarBytes('witness item'))
  }
  return items
}

function readTransaction(reader: ByteReader): Transaction {
  const start = reader.offset
  const version = reader.readInt32('tx version')

  const segwit =
    reader.peekUInt8() === SEGWIT_MARKER && reader.peekUInt8(1) === SEGWIT_FLAG
  if (segwit) {
    reader.readUInt16('segwit marker')
  }

  const ioStart = reader.offset
  const inputCount = reader.readCount(MIN_INPUT_SIZE, 'input')
  const rawInputs: Omit<TxInput, 'witness'>[] = []
  for (let i = 0; i < inputCount; i++) {
    rawInputs.push(readInput(reader))
  }

  const outputCount = reader.readCount(MIN_OUTPUT_SIZE, 'output')
  const outputs: TxOutput[] = []
  for (let i = 0; i < outputCount; i++) {
    outputs.push(readOutput(reader))
  }
  const ioEnd = reader.offset

  const inputs: TxInput[] = rawInputs.map((input) =>
    Object.freeze({
      ...input,
      witness: Object.freeze(segwit ? readWitness(reader) : []),
    }),
  )

  const lockTime = reader.readUInt32('lock time')
  const end = reader.offset

  // txid commits to version, inputs, outputs and lock time only
  const full = reader.slice(start, end)
  const stripped = segwit
    ? concatBytes(
        reader.slice(start, start + 4),
        reader.slice(ioStart, ioEnd),
        reader.slice(end - 4, end),
      )
    : full
  const hash = toDisplayHash(hash256(stripped))

  return Object.freeze({
    version,
    inputs: Object.freeze(inputs),
    outputs: Object.freeze(outputs),
    lockTime,
    segwit,
    hash,
    wtxid: segwit ? toDisplayHash(hash256(full)) : hash,
    value: outputs.reduce((sum, output) => sum + output.value, 0n),
  })
}

function assertFullyConsumed(reader: ByteReader, what: string) {
  if (reader.remaining !== 0) {
    throw new MalformedBlockError(
      `${reader.remaining} unexpected trailing bytes after ${what}`,
      { context: { offset: reader.offset } },
    )
  }
}

/**
 * Decodes exactly one 80-byte block header.
 */
export function decodeBlockHeader(bytes: Uint8Array): BlockHeader {
  if (bytes.length !== BLOCK_HEADER_SIZE) {
    throw new MalformedBlockError(
      `Block header must be ${BLOCK_HEADER_SIZE} bytes, got ${bytes.length}`,
    )
  }
  return readBlockHeader(new ByteReader(bytes))
}

export function decodeTransaction(bytes: Uint8Array): Transaction {
  const reader = new ByteReader(bytes)
  const tx = readTransaction(reader)
  assertFullyConsumed(reader, 'transaction')
  return tx
}

/**
 * Decodes a serialized block. Pure: the same bytes always give an equal
 * block with the same hash.
 *
 * @throws {MalformedBlockError} on truncated input, lengths running past the
 * buffer, impossible counts or trailing bytes
 */
export function decodeBlock(bytes: Uint8Array): Block {
  const reader = new ByteReader(bytes)
  const header = readBlockHeader(reader)
  const hash = toDisplayHash(hash256(reader.slice(0, BLOCK_HEADER_SIZE)))

  const txCount = reader.readCount(MIN_TX_SIZE, 'transaction')
  const transactions: Transaction[] = []
  for (let i = 0; i < txCount; i++) {
    transactions.push(readTransaction(reader))
  }
  assertFullyConsumed(reader, 'block')

  debug(`decoded block ${hash} txs=${txCount} size=${bytes.length}`)

  return Object.freeze({
    header,
    hash,
    transactions: Object.freeze(transactions),
    size: bytes.length,
  })
}
