/**
 * Resolver Registry
 *
 * Maps a reference scheme to the resolver that makes the image available
 * in the runtime. The registry pull resolver is registered under `null`.
 */

import {
  type ContainerRuntime,
  type Image,
  type ImageReference,
  UnresolvedReferenceError,
  parseImageReference,
} from '@berth/core'
import type { Logger } from '../logger'
import type { ObjectStore } from '../object-store'
import { DOCKER_ARCHIVE_S3_SCHEME, DockerArchiveResolver } from './docker-archive'
import { RegistryResolver } from './registry-pull'

/**
 * Turns a parsed reference into an image present in the runtime.
 */
export interface ImageResolver {
  resolve(reference: ImageReference, runtime: ContainerRuntime): Promise<Image>
}

export class ResolverRegistry {
  private resolvers: Map<string | null, ImageResolver> = new Map()

  /**
   * Register a resolver. A later registration for the same scheme replaces
   * the earlier one.
   */
  register(scheme: string | null, resolver: ImageResolver): void {
    this.resolvers.set(scheme === null ? null : scheme.toLowerCase(), resolver)
  }

  /**
   * Get the resolver for a scheme.
   * @throws UnresolvedReferenceError if none is registered
   */
  lookup(scheme: string | null): ImageResolver {
    const resolver = this.resolvers.get(scheme)
    if (!resolver) {
      throw new UnresolvedReferenceError(
        scheme === null ? '<registry>' : `${scheme}://`,
        `no resolver registered for scheme '${scheme ?? ''}'`,
      )
    }
    return resolver
  }

  has(scheme: string | null): boolean {
    return this.resolvers.has(scheme)
  }

  /**
   * Parse a raw reference and resolve it with the matching resolver.
   * @throws UnresolvedReferenceError if the reference is malformed or no resolver matches
   */
  async resolve(raw: string, runtime: ContainerRuntime): Promise<Image> {
    let reference: ImageReference
    try {
      reference = parseImageReference(raw)
    } catch (err) {
      throw new UnresolvedReferenceError(raw, err instanceof Error ? err.message : String(err))
    }

    if (!this.has(reference.scheme)) {
      throw new UnresolvedReferenceError(
        raw,
        `no resolver registered for scheme '${reference.scheme ?? ''}'`,
      )
    }
    return this.lookup(reference.scheme).resolve(reference, runtime)
  }
}

export interface DefaultResolverOptions {
  objectStore: ObjectStore
  tmpDir: string
  logger?: Logger
}

/**
 * Registry with the built-in resolvers.
 */
export function createDefaultResolverRegistry(options: DefaultResolverOptions): ResolverRegistry {
  const registry = new ResolverRegistry()
  registry.register(null, new RegistryResolver())
  registry.register(DOCKER_ARCHIVE_S3_SCHEME, new DockerArchiveResolver(options))
  return registry
}
