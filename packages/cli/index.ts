export { getCli, VERSION } from './src/cli'
export { type InspectArgs, inspectOptions } from './src/cmds/inspect/options'
export {
  formatBlockLine,
  type InspectHandlerArgs,
  inspectBlocks,
  inspectHandler,
  type InspectSummary,
  parseBlkFileNumber,
} from './src/cmds/inspect/handler'
export { type ServeArgs, serveOptions } from './src/cmds/serve/options'
export {
  type ServeHandlerArgs,
  serveConfigFromArgs,
  serveHandler,
} from './src/cmds/serve/handler'
export { type GlobalArgs, globalOptions } from './src/options/globalOptions'
