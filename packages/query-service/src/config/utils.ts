import { defaultMetricsOptions, type Metadata } from '@blockquery/metrics'
import { ConfigurationError, type Logger } from '@blockquery/utils'
import { z } from 'zod'
import * as constants from './constants'
import { type ConfigOptions, ScriptOrder, ValueUnit } from './types'

/**
 * Resolved config options with all defaults applied
 */
export interface ResolvedConfigOptions {
  readonly blocksDir: string
  readonly port: number
  readonly address: string
  readonly cors: string
  readonly valueUnit: ValueUnit
  readonly scriptOrder: ScriptOrder
  readonly validateMerkleRoot: boolean
  readonly maxOrphanBlocks: number
  readonly maxReorgDepth?: number
  readonly metrics: {
    readonly enabled: boolean
    readonly prefix: string
    readonly collectDefaultMetrics: boolean
    readonly metadata?: Metadata
  }
  readonly logger?: Logger
}

const configOptionsSchema = z.object({
  blocksDir: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
  address: z.string().min(1).optional(),
  cors: z.string().min(1).optional(),
  valueUnit: z.nativeEnum(ValueUnit).optional(),
  scriptOrder: z.nativeEnum(ScriptOrder).optional(),
  validateMerkleRoot: z.boolean().optional(),
  maxOrphanBlocks: z.number().int().nonnegative().optional(),
  maxReorgDepth: z.number().int().nonnegative().optional(),
  metrics: z
    .object({
      enabled: z.boolean().optional(),
      prefix: z
        .string()
        .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'not a valid metric name prefix')
        .optional(),
      collectDefaultMetrics: z.boolean().optional(),
      metadata: z.object({ version: z.string(), network: z.string() }).optional(),
    })
    .optional(),
})

/**
 * Create config options with all defaults applied
 */
export function createConfigFromDefaults(): ResolvedConfigOptions {
  return {
    blocksDir: constants.BLOCKS_DIR_DEFAULT,
    port: constants.PORT_DEFAULT,
    address: constants.ADDRESS_DEFAULT,
    cors: constants.CORS_DEFAULT,
    valueUnit: constants.VALUE_UNIT_DEFAULT,
    scriptOrder: constants.SCRIPT_ORDER_DEFAULT,
    validateMerkleRoot: constants.VALIDATE_MERKLE_ROOT_DEFAULT,
    maxOrphanBlocks: constants.MAX_ORPHAN_BLOCKS_DEFAULT,
    metrics: defaultMetricsOptions,
  }
}

/**
 * Create config options from user-provided options, applying defaults
 *
 * @throws {ConfigurationError} when an option has the wrong type or range
 */
export function createConfigOptions(
  options: ConfigOptions = {},
): ResolvedConfigOptions {
  const { logger, ...rest } = options
  const parsed = configOptionsSchema.safeParse(rest)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid configuration: ${issues}`, {
      cause: parsed.error,
    })
  }

  const opts = parsed.data
  const defaults = createConfigFromDefaults()

  return Object.freeze({
    blocksDir: opts.blocksDir ?? defaults.blocksDir,
    port: opts.port ?? defaults.port,
    address: opts.address ?? defaults.address,
    cors: opts.cors ?? defaults.cors,
    valueUnit: opts.valueUnit ?? defaults.valueUnit,
    scriptOrder: opts.scriptOrder ?? defaults.scriptOrder,
    validateMerkleRoot: opts.validateMerkleRoot ?? defaults.validateMerkleRoot,
    maxOrphanBlocks: opts.maxOrphanBlocks ?? defaults.maxOrphanBlocks,
    maxReorgDepth: opts.maxReorgDepth,
    metrics: Object.freeze({
      enabled: opts.metrics?.enabled ?? defaults.metrics.enabled,
      prefix: opts.metrics?.prefix ?? defaults.metrics.prefix,
      collectDefaultMetrics:
        opts.metrics?.collectDefaultMetrics ??
        defaults.metrics.collectDefaultMetrics,
      metadata: opts.metrics?.metadata,
    }),
    logger,
  })
}
