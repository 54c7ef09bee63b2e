/**
 * Core types for the berth container reconciler
 */

// =============================================================================
// Image
// =============================================================================

/**
 * Environment variable for a container or image.
 */
export interface EnvVar {
  /**
   * Variable name.
   * @example 'NODE_ENV'
   */
  readonly name: string

  /**
   * Variable value.
   * @example 'production'
   */
  readonly value: string
}

/**
 * An image already available in the runtime.
 * Equality is by `id`; `references` are informational.
 */
export interface Image {
  /**
   * Content-addressed image ID.
   * @example 'sha256:3f57d9401f8d42f986df300f0c69192fc41da28ccc8d797829467780db3dd741'
   */
  readonly id: string

  /**
   * Human-readable references pointing at this image.
   * @example ['nginx:alpine-slim']
   */
  readonly references: readonly string[]

  /** Environment baked into the image. */
  readonly environment: readonly EnvVar[]

  /**
   * Default entrypoint.
   * @example ['/docker-entrypoint.sh']
   */
  readonly entrypoint: readonly string[]

  /**
   * Default command (arguments to the entrypoint).
   * @example ['nginx', '-g', 'daemon off;']
   */
  readonly command: readonly string[]
}

// =============================================================================
// Container
// =============================================================================

/**
 * Published port mapping.
 */
export interface Port {
  /**
   * Port inside the container.
   * @example 80
   */
  readonly containerPort: number

  /**
   * Host interface to bind, or null for all interfaces.
   * @example '127.0.0.1'
   */
  readonly hostIp: string | null

  /**
   * Port on the host. Defaults to `containerPort` in manifests.
   * @example 8080
   */
  readonly hostPort: number

  /**
   * Lower-cased transport protocol.
   * @example 'tcp'
   */
  readonly protocol: string
}

/**
 * Kind of mount.
 * - `bind`: host path mounted directly
 * - `volume`: named volume managed by the runtime
 */
export type MountType = 'bind' | 'volume'

/**
 * A volume resource. Before it is mounted it has no target.
 */
export interface Volume {
  readonly type: MountType

  /**
   * Host path (bind) or volume name (volume).
   * @example '/srv/config'
   * @example 'cache'
   */
  readonly source: string

  /**
   * Path inside the container.
   * @example '/var/cache/nginx'
   */
  readonly target?: string
}

/**
 * A volume attached to a container at a target path.
 */
export interface Mount extends Volume {
  readonly target: string
}

/**
 * Runtime restart behaviour.
 * - `Always`: long-running service, restarted whenever it stops
 * - `OnFailure`: run-to-completion task, restarted only on non-zero exit
 */
export type RestartPolicy = 'Always' | 'OnFailure'

/**
 * Which reconciliation phase a managed container belongs to.
 */
export type ContainerPhase = 'init' | 'main'

/**
 * Canonical, comparable description of one container.
 *
 * Built fresh from the manifest on every apply (desired side) and decoded
 * from live runtime state (existing side). Two specs are equal only if every
 * field is equal, so a single changed environment variable makes a different
 * spec even though the name is the same.
 */
export interface ContainerSpec {
  /**
   * Container name, unique across the managed set.
   * @example 'web'
   */
  readonly name: string

  /**
   * ID of the image the container runs.
   * @example 'sha256:3f57d9401f8d...'
   */
  readonly imageId: string

  readonly entrypoint: readonly string[]
  readonly command: readonly string[]

  /** Sorted by name, then value. */
  readonly environment: readonly EnvVar[]

  /** Sorted by container port, host IP, host port, protocol. */
  readonly ports: readonly Port[]

  readonly restartPolicy: RestartPolicy

  /**
   * Sorted network names. The first is attached at creation, the rest
   * right after start.
   * @example ['berth', 'monitoring']
   */
  readonly networks: readonly string[]

  /** Sorted by type, source, target. */
  readonly mounts: readonly Mount[]
}

/**
 * Outcome of one apply pass. Each list keeps the order in which the
 * containers were removed or created.
 */
export interface ApplyResult {
  removedInitContainers: ContainerSpec[]
  createdInitContainers: ContainerSpec[]
  removedContainers: ContainerSpec[]
  createdContainers: ContainerSpec[]
}
