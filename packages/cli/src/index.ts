#!/usr/bin/env -S npx tsx
import { isBerthError } from '@berth/core'
import { createProgram } from './cli'
import { loadConfig } from './config'
import { createLogger } from './logger'
import { createS3ObjectStore } from './object-store'
import { createDefaultResolverRegistry } from './resolver/registry'
import { createDefaultRuntimeRegistry } from './runtime/registry'

const config = loadConfig()
let logger = createLogger(config.logLevel)
const objectStore = createS3ObjectStore(config.s3)

const program = createProgram({
  config,
  runtimes: createDefaultRuntimeRegistry(config),
  createResolvers: (commandLogger) =>
    createDefaultResolverRegistry({ objectStore, tmpDir: config.tmpDir, logger: commandLogger }),
  objectStore,
  createLogger: (level) => {
    logger = createLogger(level)
    return logger
  },
  print: (line) => console.log(line),
})

program.parseAsync().catch((err: unknown) => {
  if (isBerthError(err)) {
    logger.error({ code: err.code }, err.message)
  } else {
    logger.error({ err }, 'Apply failed')
  }
  process.exitCode = 1
})
