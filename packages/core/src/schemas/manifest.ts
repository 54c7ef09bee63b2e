import { z } from 'zod'

// Container and volume names become runtime object names
const namePattern = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/
const objectName = z
  .string()
  .regex(namePattern, 'Must start with a letter or digit and contain only [a-zA-Z0-9_.-]')

const restartPolicySchema = z.enum(['Always', 'OnFailure'])

// =============================================================================
// Container
// =============================================================================

export const envVarSchema = z.object({
  name: z.string().min(1).describe('Variable name'),
  value: z
    .union([z.string(), z.number(), z.boolean()])
    .transform((value) => String(value))
    .describe('Variable value (numbers and booleans are stringified)'),
})

export const containerPortSchema = z.object({
  containerPort: z.number().int().min(1).max(65535).describe('Port inside the container'),
  hostIp: z.string().optional().describe('Host interface to bind'),
  hostPort: z
    .number()
    .int()
    .min(1)
    .max(65535)
    .optional()
    .describe('Port on the host (defaults to containerPort)'),
  protocol: z
    .string()
    .transform((protocol) => protocol.toLowerCase())
    .pipe(z.enum(['tcp', 'udp', 'sctp']))
    .optional()
    .describe('Transport protocol (defaults to tcp)'),
})

export const volumeMountSchema = z.object({
  name: z.string().describe('Name of a volume declared under spec.volumes'),
  mountPath: z.string().startsWith('/').describe('Absolute path inside the container'),
})

/**
 * Container entry, shared by `containers` and `initContainers`
 */
export const containerSchema = z.object({
  name: objectName.describe('Container name'),
  image: z.string().min(1).describe('Image reference, optionally with a resolver scheme'),
  command: z.array(z.string()).optional().describe('Entrypoint override'),
  args: z.array(z.string()).optional().describe('Command override'),
  env: z.array(envVarSchema).optional().describe('Environment overrides'),
  ports: z.array(containerPortSchema).optional().describe('Published ports'),
  volumeMounts: z.array(volumeMountSchema).optional().describe('Volume mounts'),
  restartPolicy: restartPolicySchema.optional().describe('Per-container restart policy'),
})

// =============================================================================
// Volumes
// =============================================================================

export const emptyDirVolumeSchema = z.object({
  name: objectName,
  emptyDir: z.record(z.unknown()).nullable().describe('Named volume managed by the runtime'),
})

export const hostPathVolumeSchema = z.object({
  name: objectName,
  hostPath: z.object({
    path: z.string().startsWith('/').describe('Absolute host path to bind'),
  }),
})

export const volumeSchema = z.union([emptyDirVolumeSchema, hostPathVolumeSchema])

// =============================================================================
// Manifest
// =============================================================================

export const manifestSpecSchema = z
  .object({
    initContainers: z.array(containerSchema).optional().default([]),
    containers: z.array(containerSchema).min(1),
    volumes: z.array(volumeSchema).optional().default([]),
    restartPolicy: restartPolicySchema.optional().default('Always'),
  })
  .superRefine((spec, ctx) => {
    const seen = new Set<string>()
    const entries = [
      ...spec.initContainers.map((c, i) => ({ name: c.name, path: ['initContainers', i, 'name'] })),
      ...spec.containers.map((c, i) => ({ name: c.name, path: ['containers', i, 'name'] })),
    ]
    for (const entry of entries) {
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: entry.path,
          message: `Duplicate container name '${entry.name}'`,
        })
      }
      seen.add(entry.name)
    }

    const volumeNames = new Set<string>()
    spec.volumes.forEach((volume, i) => {
      if (volumeNames.has(volume.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['volumes', i, 'name'],
          message: `Duplicate volume name '${volume.name}'`,
        })
      }
      volumeNames.add(volume.name)
    })
  })

/**
 * Pod-like manifest. `apiVersion`, `kind` and `metadata` are accepted
 * and ignored.
 */
export const manifestSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
  spec: manifestSpecSchema,
})

export type Manifest = z.infer<typeof manifestSchema>
export type ManifestContainer = z.infer<typeof containerSchema>
export type ManifestVolume = z.infer<typeof volumeSchema>

// =============================================================================
// Validation utilities
// =============================================================================

/**
 * Validation error detail
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

/**
 * Parse and validate manifest data
 */
export function parseManifest(data: unknown): Manifest {
  return manifestSchema.parse(data)
}

/**
 * Safely parse manifest data, returning result with errors
 */
export function safeParseManifest(data: unknown): ParseResult<Manifest> {
  const result = manifestSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  const errors = result.error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
  return { success: false, errors }
}

/**
 * Type guard telling emptyDir volumes from hostPath volumes.
 */
export function isEmptyDirVolume(
  volume: ManifestVolume,
): volume is z.infer<typeof emptyDirVolumeSchema> {
  return 'emptyDir' in volume
}
