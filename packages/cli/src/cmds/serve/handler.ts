import {
  createConfigOptions,
  QueryNode,
  type ResolvedConfigOptions,
} from '@blockquery/query-service'
import { getLogger, type Logger } from '@blockquery/utils'
import { VERSION } from '../../version'
import type { GlobalArgs } from '../../options/globalOptions'
import type { ServeArgs } from './options'

export type ServeHandlerArgs = ServeArgs & GlobalArgs

export function serveConfigFromArgs(
  args: ServeHandlerArgs,
  logger: Logger,
): ResolvedConfigOptions {
  return createConfigOptions({
    blocksDir: args.blocksDir,
    port: args.port,
    address: args.address,
    cors: args.cors,
    valueUnit: args.valueUnit,
    scriptOrder: args.scriptOrder,
    validateMerkleRoot: args.validateMerkleRoot,
    maxOrphanBlocks: args.maxOrphanBlocks,
    maxReorgDepth: args.maxReorgDepth,
    metrics: {
      enabled: args.metrics,
      metadata: { version: VERSION, network: 'main' },
    },
    logger,
  })
}

export async function serveHandler(args: ServeHandlerArgs): Promise<void> {
  const logger = getLogger({ logLevel: args.logLevel, logFile: args.logFile })
  const node = new QueryNode({ config: serveConfigFromArgs(args, logger) })

  const shutdown = () => {
    logger.info('Shutting down...')
    node.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${String(err)}`)
        process.exit(1)
      },
    )
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  // The API answers while the chain is still loading
  await node.listen()
  const report = await node.ingest()
  logger.info(
    `Ingestion finished: ${report.accepted} accepted, ${report.failed} rejected, ${report.orphans} orphaned`,
  )
}
