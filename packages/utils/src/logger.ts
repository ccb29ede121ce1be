import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

// Root instance; createLogger children are tracked so setLogLevel reaches them
export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

const children = new Set<ConsolaInstance>()

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  children.add(child)
  return child
}

// Set global log level (root and every createLogger child)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of children)
    child.level = level
}

/**
 * Map a CLI verbosity flag pair onto a consola level.
 * `quiet` wins over `verbose` when both are given.
 */
export function resolveLogLevel(options: { verbose?: boolean, quiet?: boolean }): number {
  if (options.quiet)
    return LogLevels.warn
  if (options.verbose)
    return LogLevels.debug
  return LogLevels.info
}

export { LogLevels } from 'consola'
