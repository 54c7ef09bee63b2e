/**
 * Shared test fixtures using Faker.js
 */

import type { EnvVar, Image, Manifest, ManifestContainer } from '@berth/core'
import { faker } from '@faker-js/faker'

export function createImageId(): string {
  return `sha256:${faker.string.hexadecimal({ length: 64, casing: 'lower', prefix: '' })}`
}

export function createEnvVar(overrides?: Partial<EnvVar>): EnvVar {
  return {
    name: faker.string.alpha({ length: 8, casing: 'upper' }),
    value: faker.string.alphanumeric(12),
    ...overrides,
  }
}

export function createImage(overrides?: Partial<Image>): Image {
  return {
    id: createImageId(),
    references: [`${faker.internet.domainWord()}:${faker.system.semver()}`],
    environment: [{ name: 'PATH', value: '/usr/local/bin:/usr/bin:/bin' }],
    entrypoint: [],
    command: ['/bin/sh'],
    ...overrides,
  }
}

export function createContainerName(): string {
  return `${faker.string.alpha({ length: 6, casing: 'lower' })}-${faker.string.numeric(4)}`
}

export function createManifestContainer(
  overrides?: Partial<ManifestContainer>,
): ManifestContainer {
  return {
    name: createContainerName(),
    image: 'nginx:alpine-slim',
    ...overrides,
  }
}

export function createManifest(spec?: Partial<Manifest['spec']>): Manifest {
  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: { name: faker.internet.domainWord() },
    spec: {
      initContainers: [],
      containers: [createManifestContainer({ name: 'web' })],
      volumes: [],
      restartPolicy: 'Always',
      ...spec,
    },
  }
}
