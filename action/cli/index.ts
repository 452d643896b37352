#!/usr/bin/env node
import { writeError } from './output.js'
import { run } from './run.js'

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    writeError(err)
    process.exitCode = 1
  })
