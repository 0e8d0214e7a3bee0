#!/usr/bin/env node
import { chromeManagementCli } from '../definitions/chromemanagement.ts'
import { processIo, runCli } from '../engine.ts'

runCli(chromeManagementCli, process.argv.slice(2), processIo()).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  },
)
