export { DockerRuntime, type DockerRuntimeConfig } from './docker-runtime'
export { DockerCliRuntime, type DockerCliRuntimeConfig } from './docker-cli-runtime'
export { type CommandResult, type CommandRunner, createSpawnRunner } from './command'
export { DockerCommandError, UnsupportedContainerSpecError } from './errors'
export { parseEnvEntry, toContainerSpec, toImage } from './inspect'
