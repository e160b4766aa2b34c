import type { EngineError, InitializationError, ErrorType } from './types'

/**
 * Patterns indicating the engine ran out of memory or another hard resource
 */
const RESOURCE_ERROR_PATTERNS = [
  'out of memory',
  'cuda out of memory',
  'memory allocation',
  'resource exhausted',
  'resource_exhausted',
  'enomem',
  'vram',
  'kv cache is full',
  'too many requests'
]

const TIMEOUT_ERROR_PATTERNS = [
  'timeout',
  'timed out',
  'etimedout',
  'deadline exceeded'
]

const NETWORK_ERROR_PATTERNS = [
  'connection refused',
  'econnrefused',
  'econnreset',
  'enotfound',
  'socket hang up',
  'network error',
  'server not running',
  'failed to connect'
]

const GENERATION_ERROR_PATTERNS = [
  'generation failed',
  'no audio frames',
  'invalid prompt',
  'prompt too long',
  'text is too long',
  'context length exceeded',
  'unsupported',
  'decoding error'
]

function matchesPatterns(message: string, patterns: string[]): boolean {
  const lowerMessage = message.toLowerCase()
  return patterns.some(pattern => lowerMessage.includes(pattern))
}

function messageOf(error: unknown): string {
  if (typeof error === 'string') return error
  if (error instanceof Error) return error.message
  return String(error)
}

function detailsOf(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined
}

/**
 * Classify an error thrown by the inference engine or waveform codec
 */
export function classifyEngineError(error: unknown): EngineError {
  const message = messageOf(error)

  let type: EngineError['type'] = 'unknown_error'
  if (matchesPatterns(message, RESOURCE_ERROR_PATTERNS)) {
    type = 'resource_exhausted'
  } else if (matchesPatterns(message, TIMEOUT_ERROR_PATTERNS)) {
    type = 'timeout'
  } else if (matchesPatterns(message, NETWORK_ERROR_PATTERNS)) {
    type = 'network_error'
  } else if (matchesPatterns(message, GENERATION_ERROR_PATTERNS)) {
    type = 'generation_error'
  }

  return {
    type,
    message,
    details: detailsOf(error),
    timestamp: new Date().toISOString()
  }
}

/**
 * Classify a failure while loading a collaborator, before any chunk starts
 */
export function classifyInitializationError(
  error: unknown,
  component: InitializationError['component']
): InitializationError {
  const cause = classifyEngineError(error)
  return {
    type: 'initialization_error',
    message: cause.message,
    details: cause.details,
    timestamp: cause.timestamp,
    component,
    cause: cause.type
  }
}

/**
 * Get a log-friendly message based on error type
 */
export function getErrorMessage(error: { type: ErrorType; message: string }): string {
  const baseMessage = error.message

  switch (error.type) {
    case 'resource_exhausted':
      return `Resource exhausted: ${baseMessage}`
    case 'generation_error':
      return `Generation error: ${baseMessage}`
    case 'network_error':
      return `Network error: ${baseMessage}`
    case 'timeout':
      return `Timed out: ${baseMessage}`
    case 'initialization_error':
      return `Initialization error: ${baseMessage}`
    default:
      return baseMessage
  }
}

/**
 * Get recovery suggestion based on error type
 */
export function getRecoverySuggestion(error: { type: ErrorType }): string {
  switch (error.type) {
    case 'resource_exhausted':
      return 'Lower maxWords or run with a single worker'
    case 'generation_error':
      return 'Shorten the chunk or adjust the voice description'
    case 'network_error':
      return 'Check that the inference server is running'
    case 'timeout':
      return 'Raise requestTimeoutMs or shorten the chunks'
    case 'initialization_error':
      return 'Check the model path and the inference server logs'
    default:
      return 'Try the operation again'
  }
}
