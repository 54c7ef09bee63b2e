import { BerthError } from '@berth/core'

/**
 * A `docker` subprocess exited with a non-zero status.
 */
export class DockerCommandError extends BerthError {
  readonly code = 'DOCKER_COMMAND_FAILED'

  constructor(
    readonly args: readonly string[],
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(`docker ${args.slice(0, 2).join(' ')} exited with code ${exitCode}: ${stderr.trim()}`)
    this.name = 'DockerCommandError'
  }
}

/**
 * The spec cannot be expressed through `docker container run` flags.
 */
export class UnsupportedContainerSpecError extends BerthError {
  readonly code = 'UNSUPPORTED_CONTAINER_SPEC'

  constructor(
    readonly containerName: string,
    reason: string,
  ) {
    super(`Container ${containerName} cannot be run by the docker-cli runtime: ${reason}`)
    this.name = 'UnsupportedContainerSpecError'
  }
}
