#!/usr/bin/env tsx

import { getCli } from './cli'

const cli = getCli()

await cli
  .fail((msg, err, yarg) => {
    if (msg?.includes('Not enough non-option arguments')) {
      yarg.showHelp()
      console.log('\n')
    }

    const errorMessage =
      err !== undefined ? err.stack || err.message : msg || 'Unknown error'

    console.error(` ✖ ${errorMessage}\n`)
    process.exit(1)
  })
  .parseAsync()
