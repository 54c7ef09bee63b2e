/**
 * Docker CLI Runtime Implementation
 *
 * Implements ContainerRuntime by running the `docker` binary. Inspect output
 * is decoded with the same schemas as the dockerode backend.
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
import { z } from 'zod'
import { type CommandResult, type CommandRunner, createSpawnRunner } from './command'
import { DockerCommandError, UnsupportedContainerSpecError } from './errors'
import {
  containerInspectSchema,
  formatEnvEntry,
  imageInspectSchema,
  toContainerSpec,
  toContainerState,
  toDockerRestartPolicy,
  toImage,
} from './inspect'

export interface DockerCliRuntimeConfig {
  /**
   * Path to the docker binary.
   * @default 'docker'
   * @example '/usr/local/bin/docker'
   */
  dockerPath?: string

  /**
   * Passed to the binary as DOCKER_HOST.
   * @example 'tcp://192.168.1.100:2375'
   */
  host?: string

  /** Subprocess runner, replaced in tests. */
  runCommand?: CommandRunner
}

const volumeInspectSchema = z.array(z.object({ Name: z.string() }))

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

function arraysEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i])
}

export class DockerCliRuntime implements ContainerRuntime {
  readonly name = 'docker-cli'
  private dockerPath: string
  private runCommand: CommandRunner

  constructor(config?: DockerCliRuntimeConfig) {
    this.dockerPath = config?.dockerPath ?? 'docker'
    this.runCommand =
      config?.runCommand ??
      createSpawnRunner({ env: config?.host ? { DOCKER_HOST: config.host } : {} })
  }

  async resolveImage(reference: string): Promise<Image> {
    await this.docker(['image', 'pull', '--quiet', reference])
    const [image] = await this.inspectImages([reference])
    return image
  }

  async listImages(): Promise<Image[]> {
    const { stdout } = await this.docker(['image', 'ls', '--no-trunc', '--quiet'])
    const ids = [...new Set(lines(stdout))]
    if (ids.length === 0) return []
    return this.inspectImages(ids)
  }

  async loadArchiveImages(archive: NodeJS.ReadableStream): Promise<void> {
    await this.docker(['image', 'load', '--quiet'], archive)
  }

  async createNetwork(name: string): Promise<void> {
    const args = [
      'network',
      'create',
      '--driver',
      'bridge',
      '--label',
      `${MANAGED_LABEL}=true`,
      name,
    ]
    const result = await this.exec(args)
    if (result.exitCode === 0) return
    if (/already exists/i.test(result.stderr)) {
      throw new NetworkAlreadyExistsError(name)
    }
    throw new DockerCommandError(args, result.exitCode, result.stderr)
  }

  async getVolume(name: string): Promise<Volume> {
    const args = ['volume', 'inspect', name]
    const result = await this.exec(args)
    if (result.exitCode !== 0) {
      if (/no such volume/i.test(result.stderr)) {
        throw new VolumeNotFoundError(name)
      }
      throw new DockerCommandError(args, result.exitCode, result.stderr)
    }
    const [info] = volumeInspectSchema.parse(JSON.parse(result.stdout))
    return { type: 'volume', source: info.Name }
  }

  async createVolume(name: string): Promise<Volume> {
    await this.docker(['volume', 'create', '--label', `${MANAGED_LABEL}=true`, name])
    return this.getVolume(name)
  }

  async listContainers(phase: ContainerPhase): Promise<ContainerSpec[]> {
    const { stdout } = await this.docker([
      'container',
      'ls',
      '--all',
      '--no-trunc',
      '--filter',
      `label=${MANAGED_LABEL}=true`,
      '--filter',
      `label=${PHASE_LABEL}=${phase}`,
      '--format',
      '{{.ID}}',
    ])
    const ids = lines(stdout)
    if (ids.length === 0) return []

    const infos = await this.inspectContainers(ids)
    return infos.map(toContainerSpec)
  }

  async removeContainers(names: readonly string[]): Promise<void> {
    if (names.length === 0) return

    const args = ['container', 'rm', '--force', ...names]
    const result = await this.exec(args)
    if (result.exitCode === 0) return

    // Containers that are already gone are reported one per line
    const failures = lines(result.stderr).filter((line) => !/no such container/i.test(line))
    if (failures.length > 0) {
      throw new DockerCommandError(args, result.exitCode, failures.join('\n'))
    }
  }

  async runContainer(spec: ContainerSpec, phase: ContainerPhase): Promise<void> {
    const [primaryNetwork, ...extraNetworks] = spec.networks

    const args = [
      'container',
      'run',
      '--detach',
      '--name',
      spec.name,
      '--label',
      `${MANAGED_LABEL}=true`,
      '--label',
      `${PHASE_LABEL}=${phase}`,
      '--restart',
      toDockerRestartPolicy(spec.restartPolicy),
    ]
    if (primaryNetwork) {
      args.push('--network', primaryNetwork)
    }
    for (const env of spec.environment) {
      args.push('--env', formatEnvEntry(env))
    }
    for (const port of spec.ports) {
      const host = port.hostIp ? `${port.hostIp}:${port.hostPort}` : `${port.hostPort}`
      args.push('--publish', `${host}:${port.containerPort}/${port.protocol}`)
    }
    for (const mount of spec.mounts) {
      args.push('--mount', `type=${mount.type},source=${mount.source},target=${mount.target}`)
    }
    args.push(...(await this.entrypointArgs(spec)))
    args.push(spec.imageId, ...spec.command)

    await this.docker(args)

    for (const network of extraNetworks) {
      await this.docker(['network', 'connect', network, spec.name])
    }
  }

  async getContainerState(name: string): Promise<RuntimeContainerState> {
    const [info] = await this.inspectContainers([name])
    return toContainerState(info)
  }

  async waitContainer(name: string): Promise<number> {
    const { stdout } = await this.docker(['container', 'wait', name])
    return z.coerce.number().int().parse(stdout.trim())
  }

  /**
   * `--entrypoint` takes a single word and a non-empty override also clears
   * the image command, so only some entrypoint/command pairs can be written
   * as flags.
   */
  private async entrypointArgs(spec: ContainerSpec): Promise<string[]> {
    const [image] = await this.inspectImages([spec.imageId])

    if (arraysEqual(spec.entrypoint, image.entrypoint)) {
      if (spec.command.length === 0 && image.command.length > 0) {
        throw new UnsupportedContainerSpecError(spec.name, 'cannot clear the image command')
      }
      return []
    }
    if (spec.entrypoint.length > 1) {
      throw new UnsupportedContainerSpecError(
        spec.name,
        `multi-word entrypoint ${JSON.stringify(spec.entrypoint)}`,
      )
    }
    return ['--entrypoint', spec.entrypoint[0] ?? '']
  }

  private async inspectImages(references: string[]): Promise<Image[]> {
    const { stdout } = await this.docker(['image', 'inspect', ...references])
    return z.array(imageInspectSchema).parse(JSON.parse(stdout)).map(toImage)
  }

  private async inspectContainers(ids: string[]) {
    const { stdout } = await this.docker(['container', 'inspect', ...ids])
    return z.array(containerInspectSchema).parse(JSON.parse(stdout))
  }

  private exec(args: string[], input?: NodeJS.ReadableStream): Promise<CommandResult> {
    return this.runCommand(this.dockerPath, args, input)
  }

  /**
   * Run a command and fail on a non-zero exit.
   */
  private async docker(args: string[], input?: NodeJS.ReadableStream): Promise<CommandResult> {
    const result = await this.exec(args, input)
    if (result.exitCode !== 0) {
      throw new DockerCommandError(args, result.exitCode, result.stderr)
    }
    return result
  }
}
