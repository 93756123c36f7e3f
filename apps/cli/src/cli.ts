#!/usr/bin/env tsx
import path from 'node:path'
import { config } from 'dotenv'

import { run } from './program.js'

config({ quiet: true })

process.exitCode = run(process.argv.slice(2), {
  command: [process.execPath, ...process.execArgv, path.resolve(process.argv[1] ?? 'buildplan')],
})
