import { LOG_LEVELS, type LogLevel } from '@blockquery/utils'
import type { Options } from 'yargs'

export type GlobalArgs = {
  logLevel: LogLevel
  logFile?: string
}

export const globalOptions: Record<keyof GlobalArgs, Options> = {
  logLevel: {
    description: 'Logging verbosity level',
    type: 'string',
    choices: LOG_LEVELS,
    default: 'info',
  },
  logFile: {
    description: 'Also write logs to this file',
    type: 'string',
  },
}
