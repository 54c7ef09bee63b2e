/**
 * Runtime Registry
 *
 * Runtimes are registered as factories so that only the selected backend is
 * ever constructed.
 */

import { type ContainerRuntime, RuntimeNotFoundError } from '@berth/core'
import { DockerCliRuntime, DockerRuntime } from '@berth/docker'
import { type BerthConfig, parseDockerHost } from '../config'

export type RuntimeFactory = () => ContainerRuntime

export class RuntimeRegistry {
  private factories: Map<string, RuntimeFactory> = new Map()

  register(name: string, factory: RuntimeFactory): void {
    this.factories.set(name, factory)
  }

  /**
   * Construct the runtime registered under `name`.
   * @throws RuntimeNotFoundError if none is registered
   */
  lookup(name: string): ContainerRuntime {
    const factory = this.factories.get(name)
    if (!factory) {
      throw new RuntimeNotFoundError(name)
    }
    return factory()
  }

  has(name: string): boolean {
    return this.factories.has(name)
  }

  names(): string[] {
    return [...this.factories.keys()]
  }
}

/**
 * Registry with the built-in Docker backends.
 */
export function createDefaultRuntimeRegistry(
  config: Pick<BerthConfig, 'dockerHost' | 'dockerBin'>,
): RuntimeRegistry {
  const registry = new RuntimeRegistry()
  // DOCKER_HOST forms dockerode cannot use (ssh://) only fail when it is selected
  registry.register('docker', () => new DockerRuntime(parseDockerHost(config.dockerHost)))
  registry.register(
    'docker-cli',
    () => new DockerCliRuntime({ dockerPath: config.dockerBin, host: config.dockerHost }),
  )
  return registry
}
