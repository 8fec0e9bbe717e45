#!/usr/bin/env node
import { runCLI } from './index'

runCLI(process.argv.slice(2)).then(
  (result) => {
    process.exitCode = result.exitCode
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  }
)
