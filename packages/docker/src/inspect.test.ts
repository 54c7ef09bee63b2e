import { describe, expect, test } from 'vitest'
import {
  containerInspectSchema,
  parseEnvEntry,
  toContainerState,
  toImage,
  imageInspectSchema,
  toPorts,
} from './inspect'

function inspect(overrides: { State?: object; RestartPolicy?: string } = {}) {
  return {
    Id: 'abc',
    Name: '/web',
    Image: 'sha256:aaa',
    State: overrides.State ?? { Status: 'running', Running: true, ExitCode: 0 },
    Config: { Env: null, Entrypoint: null, Cmd: null, Labels: null },
    HostConfig: {
      RestartPolicy: { Name: overrides.RestartPolicy ?? 'always' },
      PortBindings: null,
      Mounts: null,
    },
    NetworkSettings: { Networks: null },
  }
}

describe('parseEnvEntry', () => {
  test('splits on the first equals sign', () => {
    expect(parseEnvEntry('OPTS=a=b')).toEqual({ name: 'OPTS', value: 'a=b' })
    expect(parseEnvEntry('EMPTY=')).toEqual({ name: 'EMPTY', value: '' })
    expect(parseEnvEntry('BARE')).toEqual({ name: 'BARE', value: '' })
  })
})

describe('toPorts', () => {
  test('decodes bindings with defaults', () => {
    expect(
      toPorts({
        '53/UDP': [{ HostIp: '127.0.0.1', HostPort: '5353' }],
        '80/tcp': [{ HostIp: '', HostPort: '' }],
        '443/tcp': null,
      }),
    ).toEqual([
      { containerPort: 53, hostIp: '127.0.0.1', hostPort: 5353, protocol: 'udp' },
      { containerPort: 80, hostIp: null, hostPort: 80, protocol: 'tcp' },
    ])
  })
})

describe('toImage', () => {
  test('maps config and tolerates nulls', () => {
    const image = toImage(
      imageInspectSchema.parse({
        Id: 'sha256:bbb',
        RepoTags: null,
        Config: { Env: ['PATH=/bin'], Entrypoint: null, Cmd: ['sh'] },
      }),
    )

    expect(image).toEqual({
      id: 'sha256:bbb',
      references: [],
      environment: [{ name: 'PATH', value: '/bin' }],
      entrypoint: [],
      command: ['sh'],
    })
  })
})

describe('containerInspectSchema', () => {
  test('maps restart policies', () => {
    expect(containerInspectSchema.parse(inspect()).HostConfig.RestartPolicy).toBe('Always')
    expect(
      containerInspectSchema.parse(inspect({ RestartPolicy: 'on-failure' })).HostConfig
        .RestartPolicy,
    ).toBe('OnFailure')
  })

  test('rejects restart policies berth never sets', () => {
    expect(() => containerInspectSchema.parse(inspect({ RestartPolicy: 'no' }))).toThrow(
      "Unsupported restart policy 'no'",
    )
  })
})

describe('toContainerState', () => {
  test('running container has no exit code', () => {
    expect(toContainerState(containerInspectSchema.parse(inspect()))).toEqual({
      status: 'running',
      running: true,
      exitCode: null,
    })
  })

  test('exited container reports its exit code', () => {
    const info = containerInspectSchema.parse(
      inspect({ State: { Status: 'exited', Running: false, ExitCode: 2 } }),
    )

    expect(toContainerState(info)).toEqual({ status: 'stopped', running: false, exitCode: 2 })
  })

  test('created container has not exited yet', () => {
    const info = containerInspectSchema.parse(
      inspect({ State: { Status: 'created', Running: false, ExitCode: 0 } }),
    )

    expect(toContainerState(info)).toEqual({ status: 'creating', running: false, exitCode: null })
  })
})
