import type { ApplyResult } from '@berth/core'
import { Command } from 'commander'
import { Applier } from './apply/applier'
import type { BerthConfig } from './config'
import type { Logger } from './logger'
import { loadManifest } from './manifest/loader'
import type { ObjectStore } from './object-store'
import { loadPlugins } from './plugins'
import type { ResolverRegistry } from './resolver/registry'
import type { RuntimeRegistry } from './runtime/registry'

export interface ApplyCommandOptions {
  runtime: string
  network: string[]
  import: string[]
  logLevel: string
  json?: boolean
}

export interface CliContext {
  config: BerthConfig
  runtimes: RuntimeRegistry
  /** Called once per command, after the log level is known. */
  createResolvers: (logger: Logger) => ResolverRegistry
  objectStore: ObjectStore
  createLogger: (level: string) => Logger
  stdin?: NodeJS.ReadableStream
  print: (line: string) => void
}

/**
 * Container names per result set, as printed by `--json`.
 */
export function summarizeResult(result: ApplyResult): Record<keyof ApplyResult, string[]> {
  return {
    removedInitContainers: result.removedInitContainers.map((spec) => spec.name),
    createdInitContainers: result.createdInitContainers.map((spec) => spec.name),
    removedContainers: result.removedContainers.map((spec) => spec.name),
    createdContainers: result.createdContainers.map((spec) => spec.name),
  }
}

export async function runApply(
  file: string,
  options: ApplyCommandOptions,
  context: CliContext,
): Promise<ApplyResult> {
  const logger = context.createLogger(options.logLevel)
  const resolvers = context.createResolvers(logger)

  // Plugins may register the runtime named by --runtime
  await loadPlugins(options.import, { runtimes: context.runtimes, resolvers })

  const runtime = context.runtimes.lookup(options.runtime)
  const manifest = await loadManifest(file, {
    objectStore: context.objectStore,
    stdin: context.stdin,
  })

  const applier = new Applier({
    runtime,
    resolvers,
    logger,
    defaultNetwork: context.config.defaultNetwork,
  })
  const result = await applier.apply(manifest, options.network)

  if (options.json) {
    context.print(JSON.stringify(summarizeResult(result), null, 2))
  }
  return result
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function createProgram(context: CliContext): Command {
  const program = new Command()

  program
    .name('berth')
    .description('Converge the containers on this host to a pod-like manifest')
    .version('0.1.0')

  program
    .command('apply <file>')
    .description('Apply a manifest from a path, "-" for standard input, or an s3:// URL')
    .option('-r, --runtime <name>', 'Container runtime', context.config.runtime)
    .option(
      '-n, --network <name>',
      `Existing network to attach (repeatable; default creates "${context.config.defaultNetwork}")`,
      collect,
      [],
    )
    .option(
      '-i, --import <module>',
      'Module to import first, e.g. one registering a custom runtime (repeatable)',
      collect,
      [],
    )
    .option('-l, --log-level <level>', 'Log level', context.config.logLevel)
    .option('--json', 'Print the names of removed and created containers as JSON')
    .action(async (file: string, options: ApplyCommandOptions) => {
      await runApply(file, options, context)
    })

  return program
}
