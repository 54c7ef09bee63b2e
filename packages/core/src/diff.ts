import { specKey } from './container-spec'
import type { ContainerSpec } from './types'

export interface SpecDiff {
  /** Existing specs with no equal desired spec, in existing order. */
  toRemove: ContainerSpec[]

  /** Desired specs with no equal existing spec, in desired order. */
  toCreate: ContainerSpec[]
}

/**
 * Elements of `a` that have no structurally equal element in `b`,
 * in the order of `a`.
 */
export function subtractSpecs(
  a: readonly ContainerSpec[],
  b: readonly ContainerSpec[],
): ContainerSpec[] {
  const keys = new Set(b.map(specKey))
  return a.filter((spec) => !keys.has(specKey(spec)))
}

/**
 * Compute what to remove and what to create to go from `existing` to
 * `desired`. A spec whose fields changed shows up in both lists; there is
 * no in-place update.
 */
export function diffSpecs(
  existing: readonly ContainerSpec[],
  desired: readonly ContainerSpec[],
): SpecDiff {
  return {
    toRemove: subtractSpecs(existing, desired),
    toCreate: subtractSpecs(desired, existing),
  }
}

/**
 * Set equality under structural equality.
 */
export function sameSpecSet(a: readonly ContainerSpec[], b: readonly ContainerSpec[]): boolean {
  const { toRemove, toCreate } = diffSpecs(a, b)
  return toRemove.length === 0 && toCreate.length === 0
}
