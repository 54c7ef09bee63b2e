import { spawn } from 'node:child_process'
import { pipeline } from 'node:stream/promises'

export interface CommandResult {
  exitCode: number | null
  stdout: string
  stderr: string
}

/**
 * Runs one subprocess to completion, optionally piping `input` to its stdin.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  input?: NodeJS.ReadableStream,
) => Promise<CommandResult>

export interface SpawnCommandOptions {
  /** Extra environment merged over `process.env`. */
  env?: Record<string, string>

  /**
   * Kill the process after this many milliseconds.
   * @default 600000
   */
  timeoutMs?: number
}

export function createSpawnRunner(options: SpawnCommandOptions = {}): CommandRunner {
  return (command, args, input) =>
    new Promise((resolve, reject) => {
      let stdout = ''
      let stderr = ''

      const proc = spawn(command, [...args], {
        timeout: options.timeoutMs ?? 10 * 60 * 1000,
        env: { ...process.env, ...options.env },
      })

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString()
      })

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString()
      })

      proc.on('close', (code) => {
        resolve({ exitCode: code, stdout, stderr })
      })

      proc.on('error', reject)

      if (input) {
        pipeline(input, proc.stdin).catch(reject)
      } else {
        proc.stdin.end()
      }
    })
}
