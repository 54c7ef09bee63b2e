/**
 * Image reference parsing
 *
 * Accepts `scheme://host[:port]/path[:tag]` as well as the short forms
 * `name`, `name:tag`, `host.tld/path` and `host:port/path`. A reference
 * without a scheme is resolved by pulling from a registry.
 */

/**
 * Parsed image reference.
 */
export interface ImageReference {
  /**
   * Resolver scheme, or null for a registry pull.
   * @example 'docker-archive+s3'
   */
  scheme: string | null

  /**
   * Lower-cased host name, if the reference names one.
   * @example 'docker.io'
   * @example 'my-bucket'
   */
  hostname: string | null

  /**
   * @example 5000
   */
  port: number | null

  /**
   * Absolute path, including any tag.
   * @example '/library/nginx:alpine-slim'
   */
  path: string | null

  /** The reference as written in the manifest. */
  raw: string
}

const schemePattern = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\/([^/?#]*)([^?#]*)/

/**
 * Parse an image reference.
 * @throws Error if the reference is empty
 */
export function parseImageReference(raw: string): ImageReference {
  const withScheme = schemePattern.exec(raw)
  if (withScheme?.[2]) {
    return {
      scheme: withScheme[1].toLowerCase(),
      ...parseAuthority(withScheme[2]),
      path: withScheme[3] || null,
      raw,
    }
  }

  const parts = raw.replace(/^\/+/, '').split('/')
  if (parts.length === 0 || parts[0] === '') {
    throw new Error(`Invalid image reference '${raw}'`)
  }

  // The first segment is a host only if it looks like one (registry.tld, host:port)
  const [prefix, ...rest] = parts
  if (rest.length > 0 && (prefix.includes('.') || prefix.includes(':'))) {
    return {
      scheme: null,
      ...parseAuthority(prefix),
      path: `/${rest.join('/')}`,
      raw,
    }
  }

  return { scheme: null, hostname: null, port: null, path: `/${parts.join('/')}`, raw }
}

/**
 * `host[:port]`, with the port optional.
 */
export function formatHost(ref: Pick<ImageReference, 'hostname' | 'port'>): string {
  if (!ref.hostname) return ''
  return ref.port ? `${ref.hostname}:${ref.port}` : ref.hostname
}

/**
 * Whether the last path segment carries a tag or digest.
 */
export function hasTag(path: string): boolean {
  const lastSegment = path.slice(path.lastIndexOf('/') + 1)
  return lastSegment.includes(':') || lastSegment.includes('@')
}

function parseAuthority(authority: string): Pick<ImageReference, 'hostname' | 'port'> {
  // Credentials are not part of an image reference
  const hostPort = authority.slice(authority.lastIndexOf('@') + 1)
  const portMatch = /^(.*):(\d+)$/.exec(hostPort)
  if (portMatch) {
    return {
      hostname: portMatch[1].toLowerCase() || null,
      port: Number.parseInt(portMatch[2], 10),
    }
  }
  return { hostname: hostPort.toLowerCase() || null, port: null }
}
