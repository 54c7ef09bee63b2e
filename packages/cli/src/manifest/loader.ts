import { readFile } from 'node:fs/promises'
import { text } from 'node:stream/consumers'
import { BerthError, type Manifest, type ValidationError, safeParseManifest } from '@berth/core'
import { parse as parseYaml } from 'yaml'
import { type ObjectStore, parseS3Url } from '../object-store'

/**
 * Interpolate environment variables in a string
 * Supports ${VAR} syntax, only replaces if the variable is defined in `env`
 */
export function interpolateEnvVars(content: string, env: NodeJS.ProcessEnv = process.env): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
    // Unset variables are left as written
    if (varName in env) {
      return env[varName] ?? ''
    }
    return match
  })
}

/**
 * Manifest validation error
 */
export class ManifestValidationError extends BerthError {
  readonly code = 'MANIFEST_VALIDATION'

  constructor(
    readonly source: string,
    readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid manifest in ${source}:\n${errorList}`)
    this.name = 'ManifestValidationError'
  }
}

/**
 * Parse and validate manifest YAML.
 * @param source Where the content came from, for error messages
 * @throws ManifestValidationError if the YAML is malformed or fails validation
 */
export function parseManifestText(
  content: string,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): Manifest {
  let raw: unknown
  try {
    raw = parseYaml(interpolateEnvVars(content, env))
  } catch (err) {
    throw new ManifestValidationError(source, [
      { path: '/', message: err instanceof Error ? err.message : String(err) },
    ])
  }

  const result = safeParseManifest(raw)
  if (!result.success) {
    throw new ManifestValidationError(source, result.errors)
  }
  return result.data
}

export interface LoadManifestOptions {
  /** Required for `s3://` sources. */
  objectStore?: ObjectStore

  /** Read for the `-` source. */
  stdin?: NodeJS.ReadableStream

  env?: NodeJS.ProcessEnv
}

/**
 * Load a manifest from a file path, `-` (standard input) or an `s3://` URL.
 */
export async function loadManifest(
  source: string,
  options: LoadManifestOptions = {},
): Promise<Manifest> {
  const content = await readSource(source, options)
  return parseManifestText(content, source === '-' ? '<stdin>' : source, options.env)
}

async function readSource(source: string, options: LoadManifestOptions): Promise<string> {
  if (source === '-') {
    return text(options.stdin ?? process.stdin)
  }

  if (source.startsWith('s3://')) {
    if (!options.objectStore) {
      throw new Error(`No object store configured to read ${source}`)
    }
    return options.objectStore.readText(parseS3Url(source))
  }

  return readFile(source, 'utf-8')
}
