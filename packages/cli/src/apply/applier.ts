/**
 * Apply Orchestrator
 *
 * One converge-and-exit pass:
 *   resolve images → provision network → provision volumes →
 *   reconcile init containers → reconcile main containers
 *
 * Image resolution happens before any mutation, so an unresolvable image
 * leaves the host untouched. Later failures are not rolled back; running
 * apply again finishes the job because the diff is idempotent.
 */

import {
  type ApplyResult,
  type ContainerPhase,
  type ContainerRuntime,
  type ContainerSpec,
  type ContainerSpecContext,
  type Image,
  InitContainerFailedError,
  type Manifest,
  type ManifestContainer,
  NetworkAlreadyExistsError,
  type Volume,
  VolumeNotFoundError,
  VolumeReferenceError,
  buildContainerSpec,
  diffSpecs,
  isEmptyDirVolume,
  sameSpecSet,
} from '@berth/core'
import { type Logger, createSilentLogger } from '../logger'
import type { ResolverRegistry } from '../resolver/registry'
import { type ReadinessOptions, waitForRunning } from './readiness'

export const DEFAULT_NETWORK = 'berth'

/**
 * Every mount must name a declared volume. Checked before anything is pulled
 * or created.
 */
export function checkVolumeReferences(manifest: Manifest): void {
  const declared = new Set(manifest.spec.volumes.map((volume) => volume.name))
  for (const container of [...manifest.spec.initContainers, ...manifest.spec.containers]) {
    for (const mount of container.volumeMounts ?? []) {
      if (!declared.has(mount.name)) {
        throw new VolumeReferenceError(container.name, mount.name)
      }
    }
  }
}

export interface ApplierOptions {
  runtime: ContainerRuntime
  resolvers: ResolverRegistry
  logger?: Logger

  /**
   * Network created and used when the caller names none.
   * @default 'berth'
   */
  defaultNetwork?: string

  readiness?: ReadinessOptions
}

export class Applier {
  private runtime: ContainerRuntime
  private resolvers: ResolverRegistry
  private logger: Logger
  private defaultNetwork: string
  private readiness: ReadinessOptions | undefined

  constructor(options: ApplierOptions) {
    this.runtime = options.runtime
    this.resolvers = options.resolvers
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'Applier' })
    this.defaultNetwork = options.defaultNetwork ?? DEFAULT_NETWORK
    this.readiness = options.readiness
  }

  /**
   * Converge the runtime to the manifest.
   *
   * @param networks Existing networks to attach; when empty the default
   * network is created (if needed) and used alone
   */
  async apply(manifest: Manifest, networks: readonly string[] = []): Promise<ApplyResult> {
    const { initContainers, containers } = manifest.spec

    this.logger.debug({ runtime: this.runtime.name, networks }, 'Starting apply')
    checkVolumeReferences(manifest)
    await this.runtime.installIfNeeded?.()

    const images = await this.resolveImages([...initContainers, ...containers])
    const attachedNetworks = await this.provisionNetworks(networks)
    const volumes = await this.provisionVolumes(manifest)

    const context: ContainerSpecContext = {
      images,
      volumes,
      networks: attachedNetworks,
      restartPolicy: manifest.spec.restartPolicy,
    }
    const desiredInit = initContainers.map((c) => buildContainerSpec(c, context, 'init'))
    const desiredMain = containers.map((c) => buildContainerSpec(c, context, 'main'))

    const existingInit = await this.runtime.listContainers('init')
    const existingMain = await this.runtime.listContainers('main')

    this.logger.debug({ existing: existingInit, desired: desiredInit }, 'Init containers')
    this.logger.debug({ existing: existingMain, desired: desiredMain }, 'Main containers')

    let result: ApplyResult
    if (sameSpecSet(existingInit, desiredInit)) {
      const { toRemove, toCreate } = diffSpecs(existingMain, desiredMain)
      result = {
        removedInitContainers: [],
        createdInitContainers: [],
        removedContainers: toRemove,
        createdContainers: toCreate,
      }
    } else {
      // Init containers gate the main phase, so any init change restarts everything
      const { toRemove, toCreate } = diffSpecs(existingInit, desiredInit)
      this.logger.info(
        { removed: toRemove.length, created: toCreate.length },
        'Init containers changed, recreating all containers',
      )
      result = {
        removedInitContainers: toRemove,
        createdInitContainers: toCreate,
        removedContainers: [...existingMain],
        createdContainers: [...desiredMain],
      }
    }

    await this.removeContainers(result.removedInitContainers, 'init')
    for (const spec of result.createdInitContainers) {
      await this.runInitContainer(spec)
    }

    await this.removeContainers(result.removedContainers, 'main')
    for (const spec of result.createdContainers) {
      this.logger.info({ container: spec.name, imageId: spec.imageId }, 'Creating container')
      await this.runtime.runContainer(spec, 'main')
    }

    this.logger.debug(
      {
        removedInit: result.removedInitContainers.length,
        createdInit: result.createdInitContainers.length,
        removed: result.removedContainers.length,
        created: result.createdContainers.length,
      },
      'Apply complete',
    )
    return result
  }

  /**
   * Resolve every distinct image reference concurrently.
   * All resolutions settle before the first failure is rethrown.
   */
  private async resolveImages(containers: ManifestContainer[]): Promise<Map<string, Image>> {
    const references = [...new Set(containers.map((c) => c.image))]
    const results = await Promise.allSettled(
      references.map((reference) => this.resolvers.resolve(reference, this.runtime)),
    )

    const images = new Map<string, Image>()
    for (const [i, result] of results.entries()) {
      if (result.status === 'rejected') {
        throw result.reason
      }
      this.logger.debug({ reference: references[i], imageId: result.value.id }, 'Resolved image')
      images.set(references[i], result.value)
    }
    return images
  }

  private async provisionNetworks(networks: readonly string[]): Promise<string[]> {
    if (networks.length > 0) {
      return [...networks]
    }

    try {
      await this.runtime.createNetwork(this.defaultNetwork)
      this.logger.info({ network: this.defaultNetwork }, 'Created network')
    } catch (err) {
      if (!(err instanceof NetworkAlreadyExistsError)) {
        throw err
      }
    }
    return [this.defaultNetwork]
  }

  private async provisionVolumes(manifest: Manifest): Promise<Map<string, Volume>> {
    const volumes = new Map<string, Volume>()
    for (const volume of manifest.spec.volumes) {
      if (isEmptyDirVolume(volume)) {
        volumes.set(volume.name, await this.getOrCreateVolume(volume.name))
      } else {
        volumes.set(volume.name, { type: 'bind', source: volume.hostPath.path })
      }
    }
    return volumes
  }

  private async getOrCreateVolume(name: string): Promise<Volume> {
    try {
      return await this.runtime.getVolume(name)
    } catch (err) {
      if (!(err instanceof VolumeNotFoundError)) {
        throw err
      }
    }
    this.logger.info({ volume: name }, 'Creating volume')
    return this.runtime.createVolume(name)
  }

  private async removeContainers(specs: ContainerSpec[], phase: ContainerPhase): Promise<void> {
    if (specs.length === 0) return

    for (const spec of specs) {
      this.logger.info({ container: spec.name, phase }, 'Removing container')
    }
    await this.runtime.removeContainers(specs.map((spec) => spec.name))
  }

  /**
   * Run an init container and block until it is ready (Always) or has
   * exited successfully (OnFailure).
   */
  private async runInitContainer(spec: ContainerSpec): Promise<void> {
    this.logger.info(
      { container: spec.name, imageId: spec.imageId, restartPolicy: spec.restartPolicy },
      'Creating init container',
    )
    await this.runtime.runContainer(spec, 'init')

    if (spec.restartPolicy === 'Always') {
      await waitForRunning(spec.name, () => this.runtime.getContainerState(spec.name), this.readiness)
      return
    }

    const exitCode = await this.runtime.waitContainer(spec.name)
    if (exitCode !== 0) {
      throw new InitContainerFailedError(spec.name, `exited with code ${exitCode}`)
    }
  }
}
