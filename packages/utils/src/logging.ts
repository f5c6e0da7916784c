import { createLogger, format, type Logger, transports as wTransports } from 'winston'

export type { Logger } from 'winston'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silly'

export const LOG_LEVELS: readonly LogLevel[] = [
  'error',
  'warn',
  'info',
  'debug',
  'silly',
]

const { combine, timestamp, label, printf, colorize, splat } = format

export interface LoggerArgs {
  logLevel?: LogLevel
  /** Write plain-text logs to this file as well as the console */
  logFile?: string
  /** Logger label, shown in brackets before each message */
  component?: string
  /** Disable every transport (used by tests) */
  silent?: boolean
}

const logFormat = printf(({ level, message, label: lbl, timestamp: ts, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, bigintReplacer)}` : ''
  return `${ts} [${lbl}] ${level}: ${message}${rest}`
})

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value
}

function formatConfig(component: string, colors: boolean) {
  return combine(
    ...(colors ? [colorize()] : []),
    splat(),
    label({ label: component }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    logFormat,
  )
}

/**
 * Returns a formatted {@link Logger}
 */
export function getLogger(args: LoggerArgs = {}): Logger {
  const level = args.logLevel ?? 'info'
  const component = args.component ?? 'blockquery'

  const transports: Logger['transports'][number][] = [
    new wTransports.Console({
      level,
      silent: args.silent,
      format: formatConfig(component, true),
    }),
  ]

  if (args.logFile !== undefined) {
    transports.push(
      new wTransports.File({
        level,
        filename: args.logFile,
        silent: args.silent,
        format: formatConfig(component, false),
      }),
    )
  }

  return createLogger({
    level,
    transports,
    exitOnError: false,
  })
}

/**
 * A logger with no output, the default for components embedded in tests
 */
export function getSilentLogger(): Logger {
  return getLogger({ silent: true })
}
