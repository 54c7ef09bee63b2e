import { tmpdir } from 'node:os'
import type { DockerRuntimeConfig } from '@berth/docker'

export interface S3Config {
  /**
   * Custom endpoint for S3-compatible storage.
   * @example 'http://localhost:9000'
   */
  endpoint?: string

  /** @default 'us-east-1' */
  region: string

  accessKeyId?: string
  secretAccessKey?: string
}

export interface BerthConfig {
  /**
   * Runtime backend name.
   * @default 'docker'
   */
  runtime: string

  /**
   * Network created when no `--network` is given.
   * @default 'berth'
   */
  defaultNetwork: string

  /** @default 'info' */
  logLevel: string

  /** Where downloaded archives are stored. */
  tmpDir: string

  /**
   * Raw DOCKER_HOST. The docker binary takes it as is; the dockerode backend
   * parses it with {@link parseDockerHost} when it is selected.
   */
  dockerHost?: string

  /** @default 'docker' */
  dockerBin: string

  s3: S3Config
}

/**
 * Translate DOCKER_HOST into a dockerode connection.
 * @throws Error for an unsupported scheme
 */
export function parseDockerHost(dockerHost: string | undefined): DockerRuntimeConfig | undefined {
  if (!dockerHost) {
    return undefined
  }

  if (dockerHost.startsWith('tcp://')) {
    const url = new URL(dockerHost)
    return {
      host: url.hostname,
      port: url.port ? Number.parseInt(url.port, 10) : 2375,
    }
  }

  if (dockerHost.startsWith('unix://')) {
    return {
      socketPath: dockerHost.slice('unix://'.length),
    }
  }

  // Treat as socket path if it starts with /
  if (dockerHost.startsWith('/')) {
    return { socketPath: dockerHost }
  }

  throw new Error(
    `Invalid DOCKER_HOST: ${dockerHost}. Expected tcp://host:port, unix:///path, or /path`,
  )
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BerthConfig {
  const getEnvString = (key: string, defaultValue: string): string => env[key] || defaultValue

  return {
    runtime: getEnvString('BERTH_RUNTIME', 'docker'),
    defaultNetwork: getEnvString('BERTH_DEFAULT_NETWORK', 'berth'),
    logLevel: getEnvString('BERTH_LOG_LEVEL', 'info'),
    tmpDir: getEnvString('BERTH_TMP_DIR', tmpdir()),
    dockerHost: env.DOCKER_HOST || undefined,
    dockerBin: getEnvString('DOCKER_BIN', 'docker'),
    s3: {
      endpoint: env.S3_ENDPOINT || undefined,
      region: getEnvString('AWS_REGION', 'us-east-1'),
      accessKeyId: env.AWS_ACCESS_KEY_ID || undefined,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY || undefined,
    },
  }
}
