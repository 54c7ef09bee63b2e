import { describe, expect, test } from 'vitest'
import {
  type ContainerSpecContext,
  buildContainerSpec,
  createContainerSpec,
  mergeEnvironment,
  specKey,
  specsEqual,
} from './container-spec'
import { UnresolvedReferenceError, VolumeReferenceError } from './errors'
import type { Image, Volume } from './types'

const nginx: Image = {
  id: 'sha256:aaa',
  references: ['nginx:alpine-slim'],
  environment: [
    { name: 'PATH', value: '/usr/sbin:/usr/bin' },
    { name: 'NGINX_VERSION', value: '1.27.1' },
  ],
  entrypoint: ['/docker-entrypoint.sh'],
  command: ['nginx', '-g', 'daemon off;'],
}

function createContext(overrides?: Partial<ContainerSpecContext>): ContainerSpecContext {
  return {
    images: new Map([['nginx:alpine-slim', nginx]]),
    volumes: new Map<string, Volume>(),
    networks: ['berth'],
    restartPolicy: 'Always',
    ...overrides,
  }
}

describe('createContainerSpec', () => {
  test('sorts list fields regardless of input order', () => {
    const a = createContainerSpec({
      name: 'web',
      imageId: 'sha256:aaa',
      environment: [
        { name: 'B', value: '2' },
        { name: 'A', value: '1' },
      ],
      ports: [
        { containerPort: 443, hostIp: null, hostPort: 443, protocol: 'tcp' },
        { containerPort: 80, hostIp: '127.0.0.1', hostPort: 8080, protocol: 'tcp' },
        { containerPort: 80, hostIp: null, hostPort: 80, protocol: 'tcp' },
      ],
      networks: ['zeta', 'alpha'],
      mounts: [
        { type: 'volume', source: 'cache', target: '/cache' },
        { type: 'bind', source: '/srv/conf', target: '/etc/conf' },
      ],
    })

    expect(a.environment.map((e) => e.name)).toEqual(['A', 'B'])
    expect(a.ports.map((p) => [p.containerPort, p.hostIp])).toEqual([
      [80, null],
      [80, '127.0.0.1'],
      [443, null],
    ])
    expect(a.networks).toEqual(['alpha', 'zeta'])
    expect(a.mounts.map((m) => m.type)).toEqual(['bind', 'volume'])
  })

  test('produces equal keys for logically identical specs', () => {
    const a = createContainerSpec({
      name: 'web',
      imageId: 'sha256:aaa',
      environment: [
        { name: 'A', value: '1' },
        { name: 'B', value: '2' },
      ],
      networks: ['one', 'two'],
    })
    const b = createContainerSpec({
      name: 'web',
      imageId: 'sha256:aaa',
      environment: [
        { name: 'B', value: '2' },
        { name: 'A', value: '1' },
      ],
      networks: ['two', 'one'],
    })

    expect(specKey(a)).toBe(specKey(b))
    expect(specsEqual(a, b)).toBe(true)
  })

  test('is frozen', () => {
    const spec = createContainerSpec({ name: 'web', imageId: 'sha256:aaa' })

    expect(Object.isFrozen(spec)).toBe(true)
    expect(Object.isFrozen(spec.environment)).toBe(true)
  })

  test('defaults restart policy to Always', () => {
    expect(createContainerSpec({ name: 'web', imageId: 'sha256:aaa' }).restartPolicy).toBe(
      'Always',
    )
  })
})

describe('specsEqual', () => {
  test('same name with a different field is not equal', () => {
    const a = createContainerSpec({ name: 'web', imageId: 'sha256:aaa' })
    const b = createContainerSpec({
      name: 'web',
      imageId: 'sha256:aaa',
      environment: [{ name: 'MY_ENV', value: 'test' }],
    })

    expect(specsEqual(a, b)).toBe(false)
  })

  test('different image id is not equal', () => {
    const a = createContainerSpec({ name: 'web', imageId: 'sha256:aaa' })
    const b = createContainerSpec({ name: 'web', imageId: 'sha256:bbb' })

    expect(specsEqual(a, b)).toBe(false)
  })
})

describe('mergeEnvironment', () => {
  test('manifest value replaces image value with the same name', () => {
    const merged = mergeEnvironment(
      [
        { name: 'MODE', value: 'image' },
        { name: 'KEEP', value: 'yes' },
      ],
      [{ name: 'MODE', value: 'manifest' }],
    )

    expect(merged).toEqual([
      { name: 'MODE', value: 'manifest' },
      { name: 'KEEP', value: 'yes' },
    ])
  })

  test('last manifest entry wins among duplicates', () => {
    const merged = mergeEnvironment(
      [],
      [
        { name: 'A', value: '1' },
        { name: 'A', value: '2' },
      ],
    )

    expect(merged).toEqual([{ name: 'A', value: '2' }])
  })
})

describe('buildContainerSpec', () => {
  test('inherits entrypoint, command and environment from the image', () => {
    const spec = buildContainerSpec(
      { name: 'web', image: 'nginx:alpine-slim' },
      createContext(),
      'main',
    )

    expect(spec.imageId).toBe('sha256:aaa')
    expect(spec.entrypoint).toEqual(['/docker-entrypoint.sh'])
    expect(spec.command).toEqual(['nginx', '-g', 'daemon off;'])
    expect(spec.environment).toEqual([
      { name: 'NGINX_VERSION', value: '1.27.1' },
      { name: 'PATH', value: '/usr/sbin:/usr/bin' },
    ])
    expect(spec.ports).toEqual([])
    expect(spec.mounts).toEqual([])
    expect(spec.networks).toEqual(['berth'])
    expect(spec.restartPolicy).toBe('Always')
  })

  test('command and args override the image defaults', () => {
    const spec = buildContainerSpec(
      { name: 'web', image: 'nginx:alpine-slim', command: ['/bin/sh'], args: ['-c', 'true'] },
      createContext(),
      'main',
    )

    expect(spec.entrypoint).toEqual(['/bin/sh'])
    expect(spec.command).toEqual(['-c', 'true'])
  })

  test('empty args clear the image command', () => {
    const spec = buildContainerSpec(
      { name: 'web', image: 'nginx:alpine-slim', args: [] },
      createContext(),
      'main',
    )

    expect(spec.command).toEqual([])
  })

  test('host port defaults to container port and protocol to tcp', () => {
    const spec = buildContainerSpec(
      {
        name: 'web',
        image: 'nginx:alpine-slim',
        ports: [{ containerPort: 80 }, { containerPort: 53, hostPort: 5353, protocol: 'udp' }],
      },
      createContext(),
      'main',
    )

    expect(spec.ports).toEqual([
      { containerPort: 53, hostIp: null, hostPort: 5353, protocol: 'udp' },
      { containerPort: 80, hostIp: null, hostPort: 80, protocol: 'tcp' },
    ])
  })

  test('an empty host IP is the same as none', () => {
    const spec = buildContainerSpec(
      {
        name: 'web',
        image: 'nginx:alpine-slim',
        ports: [{ containerPort: 80, hostIp: '', hostPort: 8080 }],
      },
      createContext(),
      'main',
    )

    expect(spec.ports).toEqual([
      { containerPort: 80, hostIp: null, hostPort: 8080, protocol: 'tcp' },
    ])
  })

  test('init containers default to OnFailure when the manifest default is Always', () => {
    const spec = buildContainerSpec(
      { name: 'migrate', image: 'nginx:alpine-slim' },
      createContext(),
      'init',
    )

    expect(spec.restartPolicy).toBe('OnFailure')
  })

  test('per-container restart policy overrides the init default', () => {
    const spec = buildContainerSpec(
      { name: 'sidecar', image: 'nginx:alpine-slim', restartPolicy: 'Always' },
      createContext(),
      'init',
    )

    expect(spec.restartPolicy).toBe('Always')
  })

  test('main containers follow the manifest default', () => {
    const spec = buildContainerSpec(
      { name: 'web', image: 'nginx:alpine-slim' },
      createContext({ restartPolicy: 'OnFailure' }),
      'main',
    )

    expect(spec.restartPolicy).toBe('OnFailure')
  })

  test('mounts take type and source from the provisioned volume', () => {
    const spec = buildContainerSpec(
      {
        name: 'web',
        image: 'nginx:alpine-slim',
        volumeMounts: [
          { name: 'cache', mountPath: '/var/cache/nginx' },
          { name: 'conf', mountPath: '/etc/nginx/conf.d' },
        ],
      },
      createContext({
        volumes: new Map<string, Volume>([
          ['cache', { type: 'volume', source: 'cache' }],
          ['conf', { type: 'bind', source: '/srv/nginx' }],
        ]),
      }),
      'main',
    )

    expect(spec.mounts).toEqual([
      { type: 'bind', source: '/srv/nginx', target: '/etc/nginx/conf.d' },
      { type: 'volume', source: 'cache', target: '/var/cache/nginx' },
    ])
  })

  test('throws VolumeReferenceError for an undeclared volume', () => {
    expect(() =>
      buildContainerSpec(
        {
          name: 'web',
          image: 'nginx:alpine-slim',
          volumeMounts: [{ name: 'missing', mountPath: '/data' }],
        },
        createContext(),
        'main',
      ),
    ).toThrow(VolumeReferenceError)
  })

  test('throws UnresolvedReferenceError for an unresolved image', () => {
    expect(() =>
      buildContainerSpec({ name: 'web', image: 'redis:7' }, createContext(), 'main'),
    ).toThrow(UnresolvedReferenceError)
  })
})
