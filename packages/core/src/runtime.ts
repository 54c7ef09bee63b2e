/**
 * Container Runtime Interface
 *
 * The capability contract a runtime backend implements. Backends:
 * - DockerRuntime: Docker Engine API via dockerode
 * - DockerCliRuntime: the `docker` binary as a subprocess
 *
 * The apply orchestrator and resolvers only ever hold this interface, so a
 * new backend is added by registering it, never by touching the orchestrator.
 */

import type { ContainerPhase, ContainerSpec, Image, Volume } from './types'

/**
 * Label marking containers, networks and volumes created by berth.
 */
export const MANAGED_LABEL = 'berth.managed'

/**
 * Label holding the {@link ContainerPhase} of a managed container.
 */
export const PHASE_LABEL = 'berth.phase'

/**
 * Container status as reported by the runtime.
 * - `creating`: Container is being created or restarting
 * - `running`: Container is running
 * - `stopped`: Container has exited
 * - `failed`: Container is dead or was OOM-killed
 * - `unknown`: Status cannot be determined
 */
export type RuntimeContainerStatus = 'creating' | 'running' | 'stopped' | 'failed' | 'unknown'

/**
 * One sample of a container's live state.
 */
export interface RuntimeContainerState {
  status: RuntimeContainerStatus

  /** True while the container's main process is running. */
  running: boolean

  /**
   * Exit code of the last run, or null if it has not exited yet.
   * @example 0
   */
  exitCode: number | null
}

/**
 * Container Runtime Interface.
 */
export interface ContainerRuntime {
  /**
   * Runtime name for logging/debugging.
   * @example 'docker'
   * @example 'docker-cli'
   */
  readonly name: string

  /**
   * One-time, idempotent host setup. Backends that need none leave it out.
   */
  installIfNeeded?(): Promise<void>

  /**
   * Pull an image and return it.
   * @param reference Normalized reference with a tag
   * @example 'docker.io/library/nginx:alpine-slim'
   */
  resolveImage(reference: string): Promise<Image>

  /**
   * List every image present in the runtime.
   */
  listImages(): Promise<Image[]>

  /**
   * Import all images contained in a `docker save` archive.
   * @param archive Readable archive bytes (tar, optionally gzipped)
   */
  loadArchiveImages(archive: NodeJS.ReadableStream): Promise<void>

  /**
   * Create a bridge network.
   * @throws NetworkAlreadyExistsError if a network with this name exists
   */
  createNetwork(name: string): Promise<void>

  /**
   * Look up a named volume.
   * @throws VolumeNotFoundError if it does not exist
   */
  getVolume(name: string): Promise<Volume>

  /**
   * Create a named volume and return it.
   */
  createVolume(name: string): Promise<Volume>

  /**
   * List managed containers of one phase, decoded into canonical specs.
   */
  listContainers(phase: ContainerPhase): Promise<ContainerSpec[]>

  /**
   * Force-remove containers. Names that are already gone are skipped.
   */
  removeContainers(names: readonly string[]): Promise<void>

  /**
   * Create and start a container labelled with the given phase.
   */
  runContainer(spec: ContainerSpec, phase: ContainerPhase): Promise<void>

  /**
   * Sample a container's live state once.
   */
  getContainerState(name: string): Promise<RuntimeContainerState>

  /**
   * Block until the container exits.
   * @returns Exit code
   */
  waitContainer(name: string): Promise<number>
}
