export type RulesmithErrorCode =
  | 'INVALID_REFERENCE'
  | 'UPSTREAM_UNAVAILABLE'
  | 'GENERATION_FAILED'
  | 'PERSISTENCE_FAILED'

/**
 * Base class for every failure the learn pipeline surfaces.
 * "No pattern found" is deliberately not part of this hierarchy.
 */
export class RulesmithError extends Error {
  readonly code: RulesmithErrorCode

  constructor(code: RulesmithErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** Commit URL matches neither `/commit/<hex>` nor `/commits/<hex>` */
export class InvalidReferenceError extends RulesmithError {
  readonly url: string

  constructor(url: string) {
    super('INVALID_REFERENCE', `Invalid GitHub commit URL: ${url}`)
    this.url = url
  }
}

/** Non-success response (or transport failure) from the commit API */
export class UpstreamUnavailableError extends RulesmithError {
  readonly url: string
  readonly status?: number

  constructor(url: string, detail: string, options?: { status?: number; cause?: unknown }) {
    super('UPSTREAM_UNAVAILABLE', `GitHub API request failed for ${url}: ${detail}`, { cause: options?.cause })
    this.url = url
    this.status = options?.status
  }
}

/** Model unreachable, missing credential or unvalidatable response */
export class GenerationFailedError extends RulesmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options)
  }
}

/** Filesystem error while creating the category directory or writing the artifact */
export class PersistenceFailedError extends RulesmithError {
  readonly path: string

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILED', `Cannot persist rule at ${path}: ${detail}`, options)
    this.path = path
  }
}

export function isRulesmithError(error: unknown): error is RulesmithError {
  return error instanceof RulesmithError
}

/** Human-readable message from an unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
