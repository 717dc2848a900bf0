/**
 * Process-wide settings and logging
 * =================================
 *
 * Every module logs through `log`, which prefixes messages with
 * `[PROPVALUE]` and forwards them to the configured logger. Debug output is
 * dropped unless `debug` has been switched on with `configure()`.
 */

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Minimal logger surface. `console` satisfies it, as do most logging
 * libraries.
 */
interface Logger {
  debug(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

interface PropsConfig {
  /** Emit debug-level messages (queue dispatch, value changes, bindings). */
  debug: boolean
  logger: Logger
  /** Prefix for auto-generated container names. */
  idPrefix: string
}

const defaults: PropsConfig = {
  debug: false,
  logger: console,
  idPrefix: 'PropertyValue'
}

let current: PropsConfig = { ...defaults }

/**
 * Overrides some or all of the process-wide settings.
 *
 * @example
 * ```ts
 * configure({ debug: true })
 * ```
 */
function configure(overrides: Partial<PropsConfig>): void {
  current = { ...current, ...overrides }
}

function getConfig(): Readonly<PropsConfig> {
  return current
}

/** Restores the default settings. */
function resetConfig(): void {
  current = { ...defaults }
}

// =============================================================================
// LOGGING
// =============================================================================

const PREFIX = '[PROPVALUE]'

const log = {
  debug(message: string, ...rest: unknown[]): void {
    if (!current.debug) return
    current.logger.debug(`${PREFIX} ${message}`, ...rest)
  },
  warn(message: string, ...rest: unknown[]): void {
    current.logger.warn(`${PREFIX} ${message}`, ...rest)
  },
  error(message: string, ...rest: unknown[]): void {
    current.logger.error(`${PREFIX} ${message}`, ...rest)
  }
}

let counter = 0

/** Generates a process-unique name such as `PropertyValue_12`. */
function uniqueName(prefix: string = current.idPrefix): string {
  counter += 1
  return `${prefix}_${counter}`
}

export {
  configure,
  getConfig,
  resetConfig,
  log,
  uniqueName,
  type Logger,
  type PropsConfig
}
