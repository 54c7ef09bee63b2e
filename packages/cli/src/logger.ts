/**
 * Structured Logger
 *
 * pino logger shared by the orchestrator, resolvers and CLI. Components
 * derive a child logger tagged with their name.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info'): Logger {
  return pino({ level })
}

/**
 * Logger that drops everything, for library callers that pass none.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
