/**
 * Domain Error Types
 *
 * Every error berth raises on purpose carries a stable `code`, so the CLI
 * can report it without matching on messages.
 */

export abstract class BerthError extends Error {
  abstract readonly code: string
}

export class UnresolvedReferenceError extends BerthError {
  readonly code = 'UNRESOLVED_REFERENCE'

  constructor(
    readonly reference: string,
    reason: string,
  ) {
    super(`Cannot resolve image '${reference}': ${reason}`)
    this.name = 'UnresolvedReferenceError'
  }
}

/**
 * A volume mount names a volume the manifest does not declare.
 */
export class VolumeReferenceError extends BerthError {
  readonly code = 'VOLUME_REFERENCE'

  constructor(
    readonly containerName: string,
    readonly volumeName: string,
  ) {
    super(`Container ${containerName} mounts undeclared volume '${volumeName}'`)
    this.name = 'VolumeReferenceError'
  }
}

export class NetworkAlreadyExistsError extends BerthError {
  readonly code = 'NETWORK_ALREADY_EXISTS'

  constructor(readonly network: string) {
    super(`Network ${network} already exists`)
    this.name = 'NetworkAlreadyExistsError'
  }
}

export class VolumeNotFoundError extends BerthError {
  readonly code = 'VOLUME_NOT_FOUND'

  constructor(readonly volume: string) {
    super(`Volume ${volume} not found`)
    this.name = 'VolumeNotFoundError'
  }
}

export class InitContainerFailedError extends BerthError {
  readonly code = 'INIT_CONTAINER_FAILED'

  constructor(
    readonly containerName: string,
    reason: string,
  ) {
    super(`Init container ${containerName} failed: ${reason}`)
    this.name = 'InitContainerFailedError'
  }
}

export class RuntimeNotFoundError extends BerthError {
  readonly code = 'RUNTIME_NOT_FOUND'

  constructor(readonly runtime: string) {
    super(`No runtime registered under '${runtime}'`)
    this.name = 'RuntimeNotFoundError'
  }
}

/**
 * Type guard for berth domain errors.
 */
export function isBerthError(err: unknown): err is BerthError {
  return err instanceof BerthError
}
