#!/usr/bin/env node
import { main } from './app.js'

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error('Unexpected failure:', error)
    process.exitCode = 1
  })
