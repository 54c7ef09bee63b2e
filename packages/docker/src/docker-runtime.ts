/**
 * Docker Runtime Implementation
 *
 * Implements ContainerRuntime using dockerode.
 */

import {
  type ContainerPhase,
  type ContainerRuntime,
  type ContainerSpec,
  type Image,
  MANAGED_LABEL,
  NetworkAlreadyExistsError,
  PHASE_LABEL,
  type RuntimeContainerState,
  type Volume,
  VolumeNotFoundError,
} from '@berth/core'
import Docker from 'dockerode'
import { z } from 'zod'
import {
  containerInspectSchema,
  formatEnvEntry,
  imageInspectSchema,
  portKey,
  toContainerSpec,
  toContainerState,
  toDockerRestartPolicy,
  toImage,
} from './inspect'

export interface DockerRuntimeConfig {
  /**
   * Path to the Docker socket for local connections.
   * @example '/var/run/docker.sock'
   * @example '/home/user/.docker/desktop/docker.sock'
   */
  socketPath?: string

  /**
   * Docker host for remote connections. When set, uses TCP instead of socket.
   * @example 'localhost'
   * @example '192.168.1.100'
   */
  host?: string

  /**
   * Docker port for remote connections. Only used when `host` is set.
   * @default 2375
   */
  port?: number
}

const waitResultSchema = z.object({ StatusCode: z.number() })

export class DockerRuntime implements ContainerRuntime {
  readonly name = 'docker'
  private docker: Docker

  constructor(config?: DockerRuntimeConfig) {
    if (config?.host) {
      this.docker = new Docker({ host: config.host, port: config.port ?? 2375 })
    } else {
      this.docker = new Docker({ socketPath: config?.socketPath ?? '/var/run/docker.sock' })
    }
  }

  async resolveImage(reference: string): Promise<Image> {
    const stream = await this.docker.pull(reference)
    await this.followProgress(stream)
    return this.inspectImage(reference)
  }

  async listImages(): Promise<Image[]> {
    const images = await this.docker.listImages()
    return Promise.all(images.map((image) => this.inspectImage(image.Id)))
  }

  async loadArchiveImages(archive: NodeJS.ReadableStream): Promise<void> {
    const stream = await this.docker.loadImage(archive)
    await this.followProgress(stream)
  }

  async createNetwork(name: string): Promise<void> {
    const existing = await this.docker.listNetworks({ filters: { name: [name] } })
    // The name filter matches substrings
    if (existing.some((network) => network.Name === name)) {
      throw new NetworkAlreadyExistsError(name)
    }

    await this.docker.createNetwork({
      Name: name,
      Driver: 'bridge',
      Labels: { [MANAGED_LABEL]: 'true' },
    })
  }

  async getVolume(name: string): Promise<Volume> {
    try {
      const info = await this.docker.getVolume(name).inspect()
      return { type: 'volume', source: info.Name }
    } catch (err) {
      if (this.isNotFoundError(err)) {
        throw new VolumeNotFoundError(name)
      }
      throw err
    }
  }

  async createVolume(name: string): Promise<Volume> {
    await this.docker.createVolume({ Name: name, Labels: { [MANAGED_LABEL]: 'true' } })
    return this.getVolume(name)
  }

  async listContainers(phase: ContainerPhase): Promise<ContainerSpec[]> {
    const filters = {
      label: [`${MANAGED_LABEL}=true`, `${PHASE_LABEL}=${phase}`],
    }

    const containers = await this.docker.listContainers({
      all: true,
      filters: JSON.stringify(filters),
    })

    return Promise.all(
      containers.map(async (c) => toContainerSpec(await this.inspectContainer(c.Id))),
    )
  }

  async removeContainers(names: readonly string[]): Promise<void> {
    for (const name of names) {
      try {
        await this.docker.getContainer(name).remove({ force: true })
      } catch (err) {
        if (!this.isNotFoundError(err)) {
          throw err
        }
      }
    }
  }

  async runContainer(spec: ContainerSpec, phase: ContainerPhase): Promise<void> {
    const portBindings: Record<string, { HostIp: string; HostPort: string }[]> = {}
    for (const port of spec.ports) {
      const bindings = portBindings[portKey(port)] ?? []
      bindings.push({ HostIp: port.hostIp ?? '', HostPort: String(port.hostPort) })
      portBindings[portKey(port)] = bindings
    }

    const [primaryNetwork, ...extraNetworks] = spec.networks

    const container = await this.docker.createContainer({
      name: spec.name,
      Image: spec.imageId,
      Entrypoint: [...spec.entrypoint],
      Cmd: [...spec.command],
      Env: spec.environment.map(formatEnvEntry),
      Labels: {
        [MANAGED_LABEL]: 'true',
        [PHASE_LABEL]: phase,
      },
      ExposedPorts: Object.fromEntries(Object.keys(portBindings).map((key) => [key, {}])),
      HostConfig: {
        PortBindings: portBindings,
        RestartPolicy: { Name: toDockerRestartPolicy(spec.restartPolicy) },
        Mounts: spec.mounts.map((m) => ({ Type: m.type, Source: m.source, Target: m.target })),
        NetworkMode: primaryNetwork,
      },
    })

    await container.start()

    for (const network of extraNetworks) {
      await this.docker.getNetwork(network).connect({ Container: spec.name })
    }
  }

  async getContainerState(name: string): Promise<RuntimeContainerState> {
    return toContainerState(await this.inspectContainer(name))
  }

  async waitContainer(name: string): Promise<number> {
    const result = waitResultSchema.parse(await this.docker.getContainer(name).wait())
    return result.StatusCode
  }

  private async inspectImage(reference: string): Promise<Image> {
    const info = await this.docker.getImage(reference).inspect()
    return toImage(imageInspectSchema.parse(info))
  }

  private async inspectContainer(id: string) {
    const info = await this.docker.getContainer(id).inspect()
    return containerInspectSchema.parse(info)
  }

  private followProgress(stream: NodeJS.ReadableStream): Promise<void> {
    return new Promise((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) =>
        err ? reject(err) : resolve(),
      )
    })
  }

  private isNotFoundError(err: unknown): boolean {
    if (err instanceof Error && 'statusCode' in err && err.statusCode === 404) {
      return true
    }
    return err instanceof Error && /no such (container|volume)/i.test(err.message)
  }
}
