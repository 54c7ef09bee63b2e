import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import type { ObjectLocation } from '../object-store'
import {
  ManifestValidationError,
  interpolateEnvVars,
  loadManifest,
  parseManifestText,
} from './loader'

const manifestYaml = `
apiVersion: v1
kind: Pod
metadata:
  name: test
spec:
  initContainers:
    - name: migrate
      image: busybox
      command: [/bin/sh, -c]
      args: [echo migrating]
  containers:
    - name: web
      image: nginx:\${NGINX_TAG}
      env:
        - name: WORKERS
          value: 4
      ports:
        - containerPort: 80
          hostPort: 8080
      volumeMounts:
        - name: cache
          mountPath: /var/cache/nginx
  volumes:
    - name: cache
      emptyDir: {}
`

describe('interpolateEnvVars', () => {
  test('replaces defined variables and keeps the rest', () => {
    expect(interpolateEnvVars('${A}-${B}', { A: 'one' })).toBe('one-${B}')
  })

  test('an empty variable replaces with an empty string', () => {
    expect(interpolateEnvVars('x${A}x', { A: '' })).toBe('xx')
  })
})

describe('parseManifestText', () => {
  test('parses and interpolates', () => {
    const manifest = parseManifestText(manifestYaml, 'pod.yaml', { NGINX_TAG: 'alpine-slim' })

    expect(manifest.spec.initContainers.map((c) => c.name)).toEqual(['migrate'])
    expect(manifest.spec.containers[0].image).toBe('nginx:alpine-slim')
    expect(manifest.spec.containers[0].env).toEqual([{ name: 'WORKERS', value: '4' }])
    expect(manifest.spec.restartPolicy).toBe('Always')
  })

  test('lists every validation issue', () => {
    const content = `
spec:
  restartPolicy: Sometimes
  containers:
    - name: web
`

    expect(() => parseManifestText(content, 'pod.yaml', {})).toThrow(
      new ManifestValidationError('pod.yaml', [
        { path: 'spec.containers.0.image', message: 'Required' },
        {
          path: 'spec.restartPolicy',
          message: "Invalid enum value. Expected 'Always' | 'OnFailure', received 'Sometimes'",
        },
      ]),
    )
  })

  test('reports malformed YAML as a validation error', () => {
    expect(() => parseManifestText('spec: [unclosed', 'pod.yaml', {})).toThrow(
      ManifestValidationError,
    )
  })
})

describe('loadManifest', () => {
  let baseDir: string

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'manifest-test-'))
  })

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true })
  })

  test('reads a file', async () => {
    const file = join(baseDir, 'pod.yaml')
    await writeFile(file, manifestYaml)

    const manifest = await loadManifest(file, { env: { NGINX_TAG: '1.27' } })

    expect(manifest.spec.containers[0].image).toBe('nginx:1.27')
  })

  test('reads standard input for "-"', async () => {
    const manifest = await loadManifest('-', {
      stdin: Readable.from([manifestYaml]),
      env: { NGINX_TAG: 'stable' },
    })

    expect(manifest.spec.containers[0].image).toBe('nginx:stable')
  })

  test('reads an s3 URL through the object store', async () => {
    const readText = vi.fn(async (_location: ObjectLocation) => manifestYaml)

    await loadManifest('s3://config/pods/web.yaml', {
      objectStore: { readText, download: async () => {} },
      env: {},
    })

    expect(readText).toHaveBeenCalledWith({ bucket: 'config', key: 'pods/web.yaml' })
  })

  test('names standard input in validation errors', async () => {
    await expect(
      loadManifest('-', { stdin: Readable.from(['spec: {}']), env: {} }),
    ).rejects.toThrow('Invalid manifest in <stdin>:')
  })
})
