// Orchestration
export {
  Applier,
  type ApplierOptions,
  DEFAULT_NETWORK,
  checkVolumeReferences,
} from './apply/applier'
export { type ReadinessOptions, waitForRunning } from './apply/readiness'

// Registries
export {
  type DefaultResolverOptions,
  type ImageResolver,
  ResolverRegistry,
  createDefaultResolverRegistry,
} from './resolver/registry'
export { RegistryResolver, normalizeRegistryReference } from './resolver/registry-pull'
export {
  DOCKER_ARCHIVE_S3_SCHEME,
  DockerArchiveResolver,
  type DockerArchiveResolverOptions,
  readArchiveImages,
} from './resolver/docker-archive'
export { type RuntimeFactory, RuntimeRegistry, createDefaultRuntimeRegistry } from './runtime/registry'
export { type BerthPlugin, type PluginRegistries, isBerthPlugin, loadPlugins } from './plugins'

// Manifest loading
export {
  type LoadManifestOptions,
  ManifestValidationError,
  interpolateEnvVars,
  loadManifest,
  parseManifestText,
} from './manifest/loader'

// Ambient
export { type BerthConfig, type S3Config, loadConfig, parseDockerHost } from './config'
export { type Logger, createLogger } from './logger'
export {
  type ObjectLocation,
  type ObjectStore,
  createS3ObjectStore,
  parseS3Url,
} from './object-store'

// Command line
export {
  type ApplyCommandOptions,
  type CliContext,
  createProgram,
  runApply,
  summarizeResult,
} from './cli'
