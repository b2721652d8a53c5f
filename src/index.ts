#!/usr/bin/env node
import 'dotenv/config'
import { logger } from './lib/logger.js'
import { main } from './main.js'

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Unhandled error')
    process.exitCode = 1
  })
