import {
  type ContainerRuntime,
  type Image,
  type ImageReference,
  formatHost,
  hasTag,
} from '@berth/core'
import type { ImageResolver } from './registry'

/**
 * Normalize a scheme-less reference into what the runtime pulls:
 * `host[:port]/path:tag`, with `latest` when the last segment has no tag.
 *
 * @example 'tmp' -> 'tmp:latest'
 * @example 'example.com:8000/path/to/tmp' -> 'example.com:8000/path/to/tmp:latest'
 */
export function normalizeRegistryReference(reference: ImageReference): string {
  const path = reference.path ?? ''
  const tagged = hasTag(path) ? path : `${path}:latest`
  const host = formatHost(reference)
  return host ? `${host}${tagged}` : tagged.replace(/^\/+/, '')
}

/**
 * Pulls from a container registry through the runtime.
 */
export class RegistryResolver implements ImageResolver {
  resolve(reference: ImageReference, runtime: ContainerRuntime): Promise<Image> {
    return runtime.resolveImage(normalizeRegistryReference(reference))
  }
}
