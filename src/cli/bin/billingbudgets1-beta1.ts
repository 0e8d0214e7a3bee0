#!/usr/bin/env node
import { billingBudgetsCli } from '../definitions/billingbudgets.ts'
import { processIo, runCli } from '../engine.ts'

runCli(billingBudgetsCli, process.argv.slice(2), processIo()).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  },
)
