import type { InitializationError } from '../../src/fsm/types'
import { getErrorMessage, getRecoverySuggestion } from '../../src/fsm/errorClassifier'

/**
 * Raised when a collaborator fails to load before the first chunk is dispatched.
 * The only failure that aborts a whole job.
 */
export class PipelineInitError extends Error {
  readonly info: InitializationError
  // Hint for the underlying cause, e.g. memory rather than the init step itself
  readonly suggestion: string

  constructor(info: InitializationError) {
    super(`${info.component}: ${getErrorMessage(info)}`)
    this.name = 'PipelineInitError'
    this.info = info
    this.suggestion = getRecoverySuggestion({ type: info.cause })
  }
}

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map(issue => `- ${issue}`).join('\n')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}
