#!/usr/bin/env node
import { createLogger, resolveLogLevel, setLogLevel } from '@fm-synth/utils/logger'
import { program } from 'commander'
import { config } from 'dotenv'

import pkg from '../package.json'
import { registerEvaluateCommands } from './commands/evaluate'
import { registerIngestCommand } from './commands/ingest'
import { registerSynthesizeCommand } from './commands/synthesize'

const log = createLogger('CLI')

config({ path: ['.env.local', '.env'] })

program
  .name('fm-synth')
  .description('Retrieval-augmented feature-model synthesis and evaluation')
  .version(pkg.version)
  .option('--verbose', 'Show per-iteration detail')
  .option('--quiet', 'Only show warnings and errors')
  .hook('preAction', () => {
    const { verbose, quiet } = program.opts<{ verbose?: boolean, quiet?: boolean }>()
    setLogLevel(resolveLogLevel({ verbose, quiet }))
  })

registerIngestCommand(program)
registerSynthesizeCommand(program)
registerEvaluateCommands(program)

program.parseAsync().catch((error: unknown) => {
  log.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
