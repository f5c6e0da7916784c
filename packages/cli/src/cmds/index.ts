export { inspectCommand } from './inspect/index'
export { serveCommand } from './serve/index'
