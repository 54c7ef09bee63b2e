/**
 * Object storage access for manifests and image archives.
 */

import { createWriteStream } from 'node:fs'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3'
import type { S3Config } from './config'

export interface ObjectLocation {
  /** @example 'releases' */
  bucket: string

  /** @example 'path/to/service.tar.gz' */
  key: string
}

export interface ObjectStore {
  /** Read an object as UTF-8 text. */
  readText(location: ObjectLocation): Promise<string>

  /** Stream an object into a local file. */
  download(location: ObjectLocation, destination: string): Promise<void>
}

/**
 * Split `s3://bucket/key` into its parts.
 * @throws Error if the URL is not an s3 URL with a bucket and key
 */
export function parseS3Url(url: string): ObjectLocation {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(url)
  if (!match) {
    throw new Error(`Invalid S3 URL '${url}'. Expected s3://bucket/key`)
  }
  return { bucket: match[1], key: match[2] }
}

export function formatS3Url(location: ObjectLocation): string {
  return `s3://${location.bucket}/${location.key}`
}

export function createS3ObjectStore(config: S3Config): ObjectStore {
  const client = new S3Client({
    endpoint: config.endpoint,
    region: config.region,
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined,
    // S3-compatible servers generally only support path-style addressing
    forcePathStyle: config.endpoint !== undefined,
  })

  async function getObject(location: ObjectLocation) {
    const command = new GetObjectCommand({
      Bucket: location.bucket,
      Key: location.key,
    })
    const response = await client.send(command)
    if (!response.Body) {
      throw new Error(`Empty response body for ${formatS3Url(location)}`)
    }
    return response.Body
  }

  return {
    async readText(location) {
      const body = await getObject(location)
      return body.transformToString('utf-8')
    },

    async download(location, destination) {
      const body = await getObject(location)
      if (!(body instanceof Readable)) {
        throw new Error(`Unexpected body type for ${formatS3Url(location)}`)
      }
      await pipeline(body, createWriteStream(destination))
    },
  }
}
