/**
 * docker-archive+s3 Resolver
 *
 * Resolves `docker-archive+s3://bucket/key/to/archive.tar[.gz]/<reference>`.
 * The archive is a `docker save` tarball that may hold several images. It is
 * downloaded once per process, its images are read from `manifest.json` and
 * their config blobs, and it is loaded into the runtime only when one of its
 * images is missing there.
 */

import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'
import { open } from 'node:fs/promises'
import { basename, join, posix } from 'node:path'
import { pipeline } from 'node:stream/promises'
import { createGunzip } from 'node:zlib'
import {
  type ContainerRuntime,
  type Image,
  type ImageReference,
  UnresolvedReferenceError,
} from '@berth/core'
import { parseEnvEntry } from '@berth/docker'
import { extract as createExtract } from 'tar-stream'
import { z } from 'zod'
import { type Logger, createSilentLogger } from '../logger'
import { type ObjectLocation, type ObjectStore, formatS3Url } from '../object-store'
import type { ImageResolver } from './registry'

export const DOCKER_ARCHIVE_S3_SCHEME = 'docker-archive+s3'

const GZIP_MAGIC = [0x1f, 0x8b]

const archiveManifestSchema = z.array(
  z.object({
    Config: z.string(),
    RepoTags: z
      .array(z.string())
      .nullish()
      .transform((tags) => tags ?? []),
  }),
)

const nullableList = z
  .array(z.string())
  .nullish()
  .transform((list) => list ?? [])

const imageConfigSchema = z.object({
  config: z
    .object({
      Env: nullableList,
      Entrypoint: nullableList,
      Cmd: nullableList,
    })
    .nullish(),
})

/**
 * Where the archive lives and which image inside it is wanted.
 */
export interface ArchiveReference {
  source: ObjectLocation

  /** @example 'tmp:latest' */
  target: string
}

/**
 * Split the reference path into the archive key and the image reference,
 * which is the last path segment.
 * @throws UnresolvedReferenceError if bucket, key or target is missing
 */
export function parseArchiveReference(reference: ImageReference): ArchiveReference {
  const segments = (reference.path ?? '').split('/').filter((segment) => segment.length > 0)
  const target = segments.pop()
  if (!reference.hostname || !target || segments.length === 0) {
    throw new UnresolvedReferenceError(
      reference.raw,
      'expected docker-archive+s3://bucket/path/to/archive.tar/<image>',
    )
  }
  return {
    source: { bucket: reference.hostname, key: segments.join('/') },
    target,
  }
}

/**
 * Config paths look like `<hex>.json` (legacy layout) or
 * `blobs/sha256/<hex>` (OCI layout); both name the image id.
 */
export function imageIdFromConfigPath(configPath: string): string {
  return `sha256:${posix.basename(configPath).replace(/\.json$/, '')}`
}

function normalizeEntryName(name: string): string {
  return posix.normalize(name).replace(/^\.\//, '')
}

async function isGzip(path: string): Promise<boolean> {
  const handle = await open(path, 'r')
  try {
    const { buffer, bytesRead } = await handle.read(Buffer.alloc(2), 0, 2, 0)
    return bytesRead === 2 && buffer[0] === GZIP_MAGIC[0] && buffer[1] === GZIP_MAGIC[1]
  } finally {
    await handle.close()
  }
}

async function readEntry(stream: AsyncIterable<unknown>): Promise<Buffer> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks)
}

/**
 * Read the entries selected by `wanted` fully into memory; skip the rest.
 */
async function readArchiveEntries(
  path: string,
  wanted: (name: string) => boolean,
): Promise<Map<string, Buffer>> {
  const entries = new Map<string, Buffer>()
  const extract = createExtract()

  extract.on('entry', (header, stream, next) => {
    const name = normalizeEntryName(header.name)
    if (!wanted(name)) {
      stream.on('end', () => next())
      stream.resume()
      return
    }

    void readEntry(stream).then(
      (data) => {
        entries.set(name, data)
        next()
      },
      (err: unknown) => next(err instanceof Error ? err : new Error(String(err))),
    )
  })

  if (await isGzip(path)) {
    await pipeline(createReadStream(path), createGunzip(), extract)
  } else {
    await pipeline(createReadStream(path), extract)
  }
  return entries
}

function parseJsonEntry(entries: Map<string, Buffer>, name: string): unknown {
  const entry = entries.get(name)
  if (!entry) {
    throw new Error(`${name} was not found in the archive`)
  }
  return JSON.parse(entry.toString('utf-8'))
}

/**
 * List the images contained in a `docker save` archive on disk.
 */
export async function readArchiveImages(path: string): Promise<Image[]> {
  const manifestEntries = await readArchiveEntries(path, (name) => name === 'manifest.json')
  const manifest = archiveManifestSchema.parse(parseJsonEntry(manifestEntries, 'manifest.json'))

  const configPaths = new Set(manifest.map((item) => normalizeEntryName(item.Config)))
  const configEntries = await readArchiveEntries(path, (name) => configPaths.has(name))

  return manifest.map((item) => {
    const { config } = imageConfigSchema.parse(
      parseJsonEntry(configEntries, normalizeEntryName(item.Config)),
    )
    return {
      id: imageIdFromConfigPath(item.Config),
      references: item.RepoTags,
      environment: (config?.Env ?? []).map(parseEnvEntry),
      entrypoint: config?.Entrypoint ?? [],
      command: config?.Cmd ?? [],
    }
  })
}

export interface DockerArchiveResolverOptions {
  objectStore: ObjectStore
  tmpDir: string
  logger?: Logger
}

export class DockerArchiveResolver implements ImageResolver {
  private objectStore: ObjectStore
  private tmpDir: string
  private logger: Logger
  private downloads: Map<string, Promise<string>> = new Map()
  private archiveImages: Map<string, Promise<Image[]>> = new Map()
  private loads: Map<string, Promise<void>> = new Map()

  constructor(options: DockerArchiveResolverOptions) {
    this.objectStore = options.objectStore
    this.tmpDir = options.tmpDir
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: 'DockerArchiveResolver',
    })
  }

  async resolve(reference: ImageReference, runtime: ContainerRuntime): Promise<Image> {
    const { source, target } = parseArchiveReference(reference)
    const archivePath = await this.download(source)
    const images = await this.readImages(archivePath)

    const existingIds = new Set((await runtime.listImages()).map((image) => image.id))

    // Scan every image: the archive is loaded once if any of them is missing
    let targetImage: Image | undefined
    let loaded = false
    for (const image of images) {
      if (image.references.includes(target)) {
        targetImage = image
      }
      if (!loaded && !existingIds.has(image.id)) {
        await this.load(archivePath, runtime, { archive: formatS3Url(source), imageId: image.id })
        loaded = true
      }
    }

    if (!targetImage) {
      throw new UnresolvedReferenceError(
        reference.raw,
        `'${target}' was not found in ${formatS3Url(source)}`,
      )
    }
    return targetImage
  }

  private download(source: ObjectLocation): Promise<string> {
    const url = formatS3Url(source)
    let download = this.downloads.get(url)
    if (!download) {
      const digest = createHash('sha256').update(url).digest('hex').slice(0, 16)
      const destination = join(this.tmpDir, `berth-${digest}-${basename(source.key)}`)
      this.logger.debug({ archive: url, destination }, 'Downloading archive')
      download = this.objectStore.download(source, destination).then(() => destination)
      // A failed download is retried by the next resolve
      download.catch(() => this.downloads.delete(url))
      this.downloads.set(url, download)
    }
    return download
  }

  /**
   * Concurrent resolves of references from the same archive share one load.
   */
  private load(
    archivePath: string,
    runtime: ContainerRuntime,
    context: { archive: string; imageId: string },
  ): Promise<void> {
    const key = `${runtime.name}:${archivePath}`
    let load = this.loads.get(key)
    if (!load) {
      this.logger.info({ ...context, runtime: runtime.name }, 'Loading archive')
      load = runtime.loadArchiveImages(createReadStream(archivePath))
      load.catch(() => this.loads.delete(key))
      this.loads.set(key, load)
    }
    return load
  }

  private readImages(archivePath: string): Promise<Image[]> {
    let images = this.archiveImages.get(archivePath)
    if (!images) {
      images = readArchiveImages(archivePath)
      images.catch(() => this.archiveImages.delete(archivePath))
      this.archiveImages.set(archivePath, images)
    }
    return images
  }
}
