import yargs, { type Argv } from 'yargs'
import { hideBin } from 'yargs/helpers'
import { inspectCommand, serveCommand } from './cmds/index'
import { globalOptions } from './options/globalOptions'
import { VERSION } from './version'

export { VERSION }

const topBanner = `blockquery: REST queries over a Bitcoin block directory
  * Version: ${VERSION}`

const bottomBanner = `Every option can also be set as a BLOCKQUERY_* environment variable,
  e.g. BLOCKQUERY_BLOCKS_DIR=/data/blocks`

export function getCli(argv: string[] = hideBin(process.argv)): Argv {
  return yargs(argv)
    .env('BLOCKQUERY')
    .parserConfiguration({
      'dot-notation': false,
    })
    .options(globalOptions)
    .scriptName('blockquery')
    .demandCommand(1)
    .showHelpOnFail(false)
    .usage(topBanner)
    .epilogue(bottomBanner)
    .version(VERSION)
    .alias('h', 'help')
    .alias('v', 'version')
    .command(serveCommand)
    .command(inspectCommand)
    .recommendCommands()
    .strict()
}
