/**
 * Modules loaded with `--import` may register extra runtimes and resolvers
 * by exporting a `register` function.
 */

import { resolve } from 'node:path'
import { pathToFileURL } from 'node:url'
import type { ResolverRegistry } from './resolver/registry'
import type { RuntimeRegistry } from './runtime/registry'

export interface PluginRegistries {
  runtimes: RuntimeRegistry
  resolvers: ResolverRegistry
}

export interface BerthPlugin {
  register(registries: PluginRegistries): void | Promise<void>
}

export function isBerthPlugin(module: unknown): module is BerthPlugin {
  return (
    typeof module === 'object' &&
    module !== null &&
    'register' in module &&
    typeof module.register === 'function'
  )
}

/**
 * Relative and absolute paths are imported as files, anything else as a
 * package name.
 */
export function toImportSpecifier(specifier: string, cwd = process.cwd()): string {
  if (specifier.startsWith('.') || specifier.startsWith('/')) {
    return pathToFileURL(resolve(cwd, specifier)).href
  }
  return specifier
}

/**
 * Import each module in order and let it register with the registries.
 * Modules without `register` are imported for their side effects only.
 */
export async function loadPlugins(
  specifiers: readonly string[],
  registries: PluginRegistries,
): Promise<void> {
  for (const specifier of specifiers) {
    const module: unknown = await import(toImportSpecifier(specifier))
    if (isBerthPlugin(module)) {
      await module.register(registries)
    }
  }
}
