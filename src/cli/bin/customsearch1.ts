#!/usr/bin/env node
import { customSearchCli } from '../definitions/customsearch.ts'
import { processIo, runCli } from '../engine.ts'

runCli(customSearchCli, process.argv.slice(2), processIo()).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  },
)
