import type { Options } from 'yargs'

export type InspectArgs = {
  file: string
  limit?: number
}

export const inspectOptions: Record<keyof InspectArgs, Options> = {
  file: {
    description: 'Path to a blkNNNNN.dat file',
    type: 'string',
    demandOption: true,
  },
  limit: {
    description: 'Stop after this many blocks',
    type: 'number',
  },
}
