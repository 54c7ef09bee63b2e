import { describe, expect, test } from 'vitest'
import { loadConfig, parseDockerHost } from './config'

describe('parseDockerHost', () => {
  test('returns undefined when unset', () => {
    expect(parseDockerHost(undefined)).toBeUndefined()
    expect(parseDockerHost('')).toBeUndefined()
  })

  test('tcp host with and without port', () => {
    expect(parseDockerHost('tcp://192.168.1.100:2376')).toEqual({
      host: '192.168.1.100',
      port: 2376,
    })
    expect(parseDockerHost('tcp://docker.internal')).toEqual({
      host: 'docker.internal',
      port: 2375,
    })
  })

  test('unix socket and bare path', () => {
    expect(parseDockerHost('unix:///run/user/1000/docker.sock')).toEqual({
      socketPath: '/run/user/1000/docker.sock',
    })
    expect(parseDockerHost('/var/run/docker.sock')).toEqual({
      socketPath: '/var/run/docker.sock',
    })
  })

  test('rejects other schemes', () => {
    expect(() => parseDockerHost('ssh://user@host')).toThrow('Invalid DOCKER_HOST: ssh://user@host')
  })
})

describe('loadConfig', () => {
  test('defaults', () => {
    const config = loadConfig({ BERTH_TMP_DIR: '/scratch' })

    expect(config).toEqual({
      runtime: 'docker',
      defaultNetwork: 'berth',
      logLevel: 'info',
      tmpDir: '/scratch',
      dockerHost: undefined,
      dockerBin: 'docker',
      s3: {
        endpoint: undefined,
        region: 'us-east-1',
        accessKeyId: undefined,
        secretAccessKey: undefined,
      },
    })
  })

  test('keeps DOCKER_HOST forms only the docker binary understands', () => {
    const config = loadConfig({
      BERTH_TMP_DIR: '/scratch',
      DOCKER_HOST: 'ssh://deploy@build-host',
    })

    expect(config.dockerHost).toBe('ssh://deploy@build-host')
  })

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      BERTH_RUNTIME: 'docker-cli',
      BERTH_DEFAULT_NETWORK: 'apps',
      BERTH_LOG_LEVEL: 'debug',
      DOCKER_HOST: 'tcp://localhost:2375',
      DOCKER_BIN: '/opt/docker/bin/docker',
      S3_ENDPOINT: 'http://localhost:9000',
      AWS_REGION: 'eu-west-1',
      AWS_ACCESS_KEY_ID: 'test-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
    })

    expect(config.runtime).toBe('docker-cli')
    expect(config.defaultNetwork).toBe('apps')
    expect(config.logLevel).toBe('debug')
    expect(config.dockerHost).toBe('tcp://localhost:2375')
    expect(config.dockerBin).toBe('/opt/docker/bin/docker')
    expect(config.s3).toEqual({
      endpoint: 'http://localhost:9000',
      region: 'eu-west-1',
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
    })
  })
})
