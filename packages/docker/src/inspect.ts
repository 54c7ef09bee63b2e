/**
 * Decoding of Docker inspect output
 *
 * Both backends receive the same JSON from the engine (dockerode returns it
 * parsed, the CLI prints it), so the schemas and the conversion into
 * canonical specs live here.
 */

import {
  type ContainerSpec,
  type EnvVar,
  type Image,
  type Mount,
  type Port,
  type RestartPolicy,
  type RuntimeContainerState,
  type RuntimeContainerStatus,
  createContainerSpec,
} from '@berth/core'
import { z } from 'zod'

const stringList = z
  .array(z.string())
  .nullish()
  .transform((list) => list ?? [])

// =============================================================================
// Image
// =============================================================================

export const imageInspectSchema = z.object({
  Id: z.string(),
  RepoTags: stringList,
  Config: z
    .object({
      Env: stringList,
      Entrypoint: stringList,
      Cmd: stringList,
    })
    .nullish(),
})

export type ImageInspect = z.infer<typeof imageInspectSchema>

// =============================================================================
// Container
// =============================================================================

const portBindingSchema = z.object({
  HostIp: z.string().optional(),
  HostPort: z.string().optional(),
})

const restartPolicySchema = z
  .object({ Name: z.string() })
  .transform(({ Name }, ctx): RestartPolicy => {
    if (Name === 'always') return 'Always'
    if (Name === 'on-failure') return 'OnFailure'
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unsupported restart policy '${Name}'`,
    })
    return z.NEVER
  })

const mountSchema = z.object({
  Type: z.string(),
  Source: z.string(),
  Target: z.string(),
})

const stateSchema = z.object({
  Status: z.string(),
  Running: z.boolean(),
  Paused: z.boolean().optional(),
  Restarting: z.boolean().optional(),
  OOMKilled: z.boolean().optional(),
  Dead: z.boolean().optional(),
  ExitCode: z.number().optional(),
})

export const containerInspectSchema = z.object({
  Id: z.string(),
  Name: z.string(),
  Image: z.string(),
  State: stateSchema,
  Config: z.object({
    Env: stringList,
    Entrypoint: stringList,
    Cmd: stringList,
    Labels: z.record(z.string()).nullish(),
  }),
  HostConfig: z.object({
    RestartPolicy: restartPolicySchema,
    PortBindings: z.record(z.array(portBindingSchema).nullable()).nullish(),
    Mounts: z.array(mountSchema).nullish(),
  }),
  NetworkSettings: z.object({
    Networks: z.record(z.unknown()).nullish(),
  }),
})

export type ContainerInspect = z.infer<typeof containerInspectSchema>

// =============================================================================
// Conversion
// =============================================================================

/**
 * Split `NAME=value` on the first `=`. An entry without `=` has an empty value.
 */
export function parseEnvEntry(entry: string): EnvVar {
  const separator = entry.indexOf('=')
  if (separator === -1) {
    return { name: entry, value: '' }
  }
  return { name: entry.slice(0, separator), value: entry.slice(separator + 1) }
}

export function formatEnvEntry(env: EnvVar): string {
  return `${env.name}=${env.value}`
}

export function toImage(info: ImageInspect): Image {
  return {
    id: info.Id,
    references: info.RepoTags,
    environment: (info.Config?.Env ?? []).map(parseEnvEntry),
    entrypoint: info.Config?.Entrypoint ?? [],
    command: info.Config?.Cmd ?? [],
  }
}

/**
 * Decode `PortBindings`, e.g. `{"80/tcp": [{"HostIp": "", "HostPort": "8080"}]}`.
 */
export function toPorts(bindings: ContainerInspect['HostConfig']['PortBindings']): Port[] {
  const ports: Port[] = []
  for (const [key, hostBindings] of Object.entries(bindings ?? {})) {
    const [portPart, protocol = 'tcp'] = key.split('/')
    const containerPort = Number.parseInt(portPart, 10)
    for (const binding of hostBindings ?? []) {
      ports.push({
        containerPort,
        hostIp: binding.HostIp || null,
        hostPort: binding.HostPort ? Number.parseInt(binding.HostPort, 10) : containerPort,
        protocol: protocol.toLowerCase(),
      })
    }
  }
  return ports
}

function toMounts(mounts: ContainerInspect['HostConfig']['Mounts']): Mount[] {
  const result: Mount[] = []
  for (const mount of mounts ?? []) {
    if (mount.Type === 'bind' || mount.Type === 'volume') {
      result.push({ type: mount.Type, source: mount.Source, target: mount.Target })
    }
  }
  return result
}

export function toContainerSpec(info: ContainerInspect): ContainerSpec {
  return createContainerSpec({
    name: info.Name.replace(/^\//, ''),
    imageId: info.Image,
    entrypoint: info.Config.Entrypoint,
    command: info.Config.Cmd,
    environment: info.Config.Env.map(parseEnvEntry),
    ports: toPorts(info.HostConfig.PortBindings),
    restartPolicy: info.HostConfig.RestartPolicy,
    networks: Object.keys(info.NetworkSettings.Networks ?? {}),
    mounts: toMounts(info.HostConfig.Mounts),
  })
}

export function toStatus(state: ContainerInspect['State']): RuntimeContainerStatus {
  if (state.Running) return 'running'
  if (state.Paused) return 'stopped'
  if (state.Restarting) return 'creating'
  if (state.Dead || state.OOMKilled) return 'failed'
  if (state.Status === 'created') return 'creating'
  if (state.Status === 'exited') return 'stopped'
  return 'unknown'
}

export function toContainerState(info: ContainerInspect): RuntimeContainerState {
  const exited = !info.State.Running && info.State.Status !== 'created'
  return {
    status: toStatus(info.State),
    running: info.State.Running,
    exitCode: exited ? (info.State.ExitCode ?? null) : null,
  }
}

// =============================================================================
// Encoding
// =============================================================================

export function toDockerRestartPolicy(policy: RestartPolicy): 'always' | 'on-failure' {
  return policy === 'Always' ? 'always' : 'on-failure'
}

/**
 * Key used by Docker for a container port, e.g. `80/tcp`.
 */
export function portKey(port: Port): string {
  return `${port.containerPort}/${port.protocol}`
}
