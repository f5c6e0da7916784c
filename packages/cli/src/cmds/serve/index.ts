import type { CommandModule } from 'yargs'
import type { GlobalArgs } from '../../options/globalOptions'
import { type ServeHandlerArgs, serveHandler } from './handler'
import { serveOptions } from './options'

export const serveCommand = {
  command: 'serve',
  describe: 'Index a block directory and serve the query API',
  builder: serveOptions,
  handler: async (args) => {
    await serveHandler(args)
  },
} satisfies CommandModule<GlobalArgs, ServeHandlerArgs>
