/**
 * Container spec construction
 *
 * Every ContainerSpec, whether built from a manifest or decoded from live
 * runtime state, goes through createContainerSpec() so that list fields are
 * sorted the same way and equal specs serialize to the same key.
 */

import { UnresolvedReferenceError, VolumeReferenceError } from './errors'
import type { ManifestContainer } from './schemas/manifest'
import type {
  ContainerPhase,
  ContainerSpec,
  EnvVar,
  Image,
  Mount,
  Port,
  RestartPolicy,
  Volume,
} from './types'

// =============================================================================
// Ordering
// =============================================================================

type Comparator<T> = (a: T, b: T) => number

// Code-unit order, independent of locale
function compareStrings(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

function compareNullableStrings(a: string | null, b: string | null): number {
  if (a === b) return 0
  if (a === null) return -1
  if (b === null) return 1
  return compareStrings(a, b)
}

function chain<T>(...comparators: Comparator<T>[]): Comparator<T> {
  return (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b)
      if (result !== 0) return result
    }
    return 0
  }
}

export const compareEnvVars: Comparator<EnvVar> = chain(
  (a, b) => compareStrings(a.name, b.name),
  (a, b) => compareStrings(a.value, b.value),
)

export const comparePorts: Comparator<Port> = chain(
  (a, b) => a.containerPort - b.containerPort,
  (a, b) => compareNullableStrings(a.hostIp, b.hostIp),
  (a, b) => a.hostPort - b.hostPort,
  (a, b) => compareStrings(a.protocol, b.protocol),
)

export const compareMounts: Comparator<Mount> = chain(
  (a, b) => compareStrings(a.type, b.type),
  (a, b) => compareStrings(a.source, b.source),
  (a, b) => compareStrings(a.target, b.target),
)

// =============================================================================
// Canonical construction
// =============================================================================

/**
 * Fields accepted by {@link createContainerSpec}. Lists may be in any order.
 */
export interface ContainerSpecFields {
  name: string
  imageId: string
  entrypoint?: readonly string[]
  command?: readonly string[]
  environment?: readonly EnvVar[]
  ports?: readonly Port[]
  restartPolicy?: RestartPolicy
  networks?: readonly string[]
  mounts?: readonly Mount[]
}

/**
 * Build a frozen, canonically ordered ContainerSpec.
 */
export function createContainerSpec(fields: ContainerSpecFields): ContainerSpec {
  const environment = (fields.environment ?? [])
    .map((e) => Object.freeze({ name: e.name, value: e.value }))
    .sort(compareEnvVars)
  const ports = (fields.ports ?? [])
    .map((p) =>
      Object.freeze({
        containerPort: p.containerPort,
        hostIp: p.hostIp,
        hostPort: p.hostPort,
        protocol: p.protocol,
      }),
    )
    .sort(comparePorts)
  const mounts = (fields.mounts ?? [])
    .map((m) => Object.freeze({ type: m.type, source: m.source, target: m.target }))
    .sort(compareMounts)
  const networks = [...new Set(fields.networks ?? [])].sort(compareStrings)

  const spec: ContainerSpec = {
    name: fields.name,
    imageId: fields.imageId,
    entrypoint: Object.freeze([...(fields.entrypoint ?? [])]),
    command: Object.freeze([...(fields.command ?? [])]),
    environment: Object.freeze(environment),
    ports: Object.freeze(ports),
    restartPolicy: fields.restartPolicy ?? 'Always',
    networks: Object.freeze(networks),
    mounts: Object.freeze(mounts),
  }
  return Object.freeze(spec)
}

/**
 * Canonical serialization of a spec. Equal specs produce equal keys.
 */
export function specKey(spec: ContainerSpec): string {
  return JSON.stringify([
    spec.name,
    spec.imageId,
    spec.entrypoint,
    spec.command,
    spec.environment.map((e) => [e.name, e.value]),
    spec.ports.map((p) => [p.containerPort, p.hostIp, p.hostPort, p.protocol]),
    spec.restartPolicy,
    spec.networks,
    spec.mounts.map((m) => [m.type, m.source, m.target]),
  ])
}

/**
 * Full structural equality.
 */
export function specsEqual(a: ContainerSpec, b: ContainerSpec): boolean {
  return specKey(a) === specKey(b)
}

// =============================================================================
// Manifest → spec
// =============================================================================

/**
 * Resolved inputs shared by every container of one manifest.
 */
export interface ContainerSpecContext {
  /** Resolved images keyed by the reference string written in the manifest. */
  images: ReadonlyMap<string, Image>

  /** Provisioned volumes keyed by manifest volume name. */
  volumes: ReadonlyMap<string, Volume>

  networks: readonly string[]

  /** Manifest-level default restart policy. */
  restartPolicy: RestartPolicy
}

/**
 * Merge image and manifest environments. A manifest entry replaces an image
 * entry with the same name; among manifest entries the last one wins.
 */
export function mergeEnvironment(
  imageEnv: readonly EnvVar[],
  overrides: readonly EnvVar[],
): EnvVar[] {
  const merged = new Map<string, string>()
  for (const { name, value } of [...imageEnv, ...overrides]) {
    merged.set(name, value)
  }
  return Array.from(merged, ([name, value]) => ({ name, value }))
}

/**
 * Default restart policy for a container of the given phase. Init containers
 * are run-to-completion tasks, so a manifest default of Always becomes
 * OnFailure for them.
 */
export function defaultRestartPolicy(
  manifestDefault: RestartPolicy,
  phase: ContainerPhase,
): RestartPolicy {
  if (phase === 'init' && manifestDefault === 'Always') {
    return 'OnFailure'
  }
  return manifestDefault
}

/**
 * Build the desired spec for one manifest container.
 *
 * @throws UnresolvedReferenceError if the container's image was not resolved
 * @throws VolumeReferenceError if a mount names an undeclared volume
 */
export function buildContainerSpec(
  container: ManifestContainer,
  context: ContainerSpecContext,
  phase: ContainerPhase,
): ContainerSpec {
  const image = context.images.get(container.image)
  if (!image) {
    throw new UnresolvedReferenceError(container.image, 'image was not resolved')
  }

  const ports: Port[] = (container.ports ?? []).map((port) => ({
    containerPort: port.containerPort,
    // An empty host IP publishes on every interface, which reads back as null
    hostIp: port.hostIp || null,
    hostPort: port.hostPort ?? port.containerPort,
    protocol: port.protocol ?? 'tcp',
  }))

  const mounts: Mount[] = (container.volumeMounts ?? []).map((mount) => {
    const volume = context.volumes.get(mount.name)
    if (!volume) {
      throw new VolumeReferenceError(container.name, mount.name)
    }
    return { type: volume.type, source: volume.source, target: mount.mountPath }
  })

  return createContainerSpec({
    name: container.name,
    imageId: image.id,
    entrypoint: container.command ?? image.entrypoint,
    command: container.args ?? image.command,
    environment: mergeEnvironment(image.environment, container.env ?? []),
    ports,
    restartPolicy:
      container.restartPolicy ?? defaultRestartPolicy(context.restartPolicy, phase),
    networks: context.networks,
    mounts,
  })
}
