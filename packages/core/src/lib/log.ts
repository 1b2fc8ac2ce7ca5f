export interface Logger {
  debug(msg: string, ...args: unknown[]): void
  info(msg: string, ...args: unknown[]): void
  warn(msg: string, ...args: unknown[]): void
  error(msg: string, ...args: unknown[]): void
}

export function isDebugEnabled(opts?: { debug?: boolean }): boolean {
  return !!opts?.debug || process.env.RULESMITH_DEBUG === '1' || process.env.RULESMITH_DEBUG === 'true'
}

/**
 * Console logger with a `[scope]` prefix. Debug lines are dropped unless
 * `debug` is set or RULESMITH_DEBUG is on.
 */
export function createLogger(scope: string, opts?: { debug?: boolean }): Logger {
  const tag = `[${scope}]`
  const debugOn = isDebugEnabled(opts)
  return {
    debug: (msg, ...args) => {
      if (debugOn) console.log(tag, msg, ...args)
    },
    info: (msg, ...args) => console.log(tag, msg, ...args),
    warn: (msg, ...args) => console.warn(tag, msg, ...args),
    error: (msg, ...args) => console.error(tag, msg, ...args),
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
