#!/usr/bin/env node
import 'dotenv/config'
import { createClient } from '../index.js'
import { writeError } from './output.js'
import { runCli } from './program.js'

async function main() {
  process.exitCode = await runCli(process.argv.slice(2), () => createClient())
}

main().catch((err) => {
  writeError(err)
  process.exitCode = 1
})
