import type { CommandModule } from 'yargs'
import type { GlobalArgs } from '../../options/globalOptions'
import { type InspectHandlerArgs, inspectHandler } from './handler'
import { inspectOptions } from './options'

export const inspectCommand = {
  command: 'inspect',
  describe: 'Print hash, transaction count and size of each block in a blk file',
  builder: inspectOptions,
  handler: async (args) => {
    const { failures } = await inspectHandler(args)
    if (failures.length > 0) process.exitCode = 1
  },
} satisfies CommandModule<GlobalArgs, InspectHandlerArgs>
