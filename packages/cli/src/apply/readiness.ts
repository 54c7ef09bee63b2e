import { InitContainerFailedError, type RuntimeContainerState } from '@berth/core'

export interface ReadinessOptions {
  /**
   * Consecutive running samples required.
   * @default 4
   */
  threshold?: number

  /**
   * Samples taken before giving up.
   * @default 60
   */
  maxSamples?: number

  /**
   * Delay between samples in milliseconds.
   * @default 1000
   */
  intervalMs?: number

  /** Replaced in tests to avoid real delays. */
  sleep?: (ms: number) => Promise<void>
}

const DEFAULT_OPTIONS: Required<ReadinessOptions> = {
  threshold: 4,
  maxSamples: 60,
  intervalMs: 1000,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
}

/**
 * Poll `sample` until the container has been seen running on `threshold`
 * consecutive samples. A sample that is not running resets the count.
 *
 * @throws InitContainerFailedError when `maxSamples` are used up
 */
export async function waitForRunning(
  name: string,
  sample: () => Promise<RuntimeContainerState>,
  options?: ReadinessOptions,
): Promise<void> {
  const { threshold, maxSamples, intervalMs, sleep } = { ...DEFAULT_OPTIONS, ...options }

  let consecutive = 0
  for (let attempt = 1; attempt <= maxSamples; attempt++) {
    const state = await sample()
    consecutive = state.running ? consecutive + 1 : 0
    if (consecutive >= threshold) {
      return
    }
    if (attempt < maxSamples) {
      await sleep(intervalMs)
    }
  }

  throw new InitContainerFailedError(
    name,
    `not running on ${threshold} consecutive samples after ${maxSamples} attempts`,
  )
}
