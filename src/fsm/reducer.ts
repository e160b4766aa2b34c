import type {
  ChunkState,
  ChunkAction,
  AttemptingState,
  JobContext,
  JobAction
} from './types'

/**
 * Check whether the current attempt has already been recorded as failed,
 * meaning the next ATTEMPT_STARTED is allowed
 */
export function awaitingRetry(state: ChunkState): state is AttemptingState {
  return state.type === 'ATTEMPTING' && state.failures.length === state.attempt
}

export function isTerminal(state: ChunkState): boolean {
  return state.type === 'DELIVERED' || state.type === 'EXHAUSTED'
}

/**
 * Per-chunk reducer: QUEUED -> ATTEMPTING(n) -> DELIVERED | EXHAUSTED
 */
export function chunkReducer(state: ChunkState, action: ChunkAction): ChunkState {
  switch (action.type) {
    case 'ATTEMPT_STARTED': {
      if (state.type === 'QUEUED' && action.attempt === 1) {
        return { type: 'ATTEMPTING', attempt: 1, seed: action.seed, failures: [] }
      }
      if (awaitingRetry(state) && action.attempt === state.attempt + 1) {
        return { ...state, attempt: action.attempt, seed: action.seed }
      }
      console.warn('Invalid transition: ATTEMPT_STARTED', action.attempt, 'from', state.type)
      return state
    }

    case 'ATTEMPT_PASSED': {
      if (state.type !== 'ATTEMPTING' || awaitingRetry(state)) {
        console.warn('Invalid transition: ATTEMPT_PASSED from', state.type)
        return state
      }
      return { type: 'DELIVERED', attemptsUsed: state.attempt, failures: state.failures }
    }

    case 'ATTEMPT_FAILED': {
      if (state.type !== 'ATTEMPTING' || awaitingRetry(state)) {
        console.warn('Invalid transition: ATTEMPT_FAILED from', state.type)
        return state
      }
      const failures = [...state.failures, action.failure]
      if (state.attempt >= action.maxAttempts) {
        return { type: 'EXHAUSTED', attemptsUsed: state.attempt, failures }
      }
      return { ...state, failures }
    }

    default:
      return state
  }
}

/**
 * Job reducer: RUNNING -> COMPLETED | CANCELLED
 */
export function jobReducer(context: JobContext, action: JobAction): JobContext {
  switch (action.type) {
    case 'CANCEL_REQUESTED': {
      if (context.status !== 'RUNNING') return context
      return { ...context, cancelRequested: true }
    }

    case 'FINISHED': {
      if (context.status !== 'RUNNING') return context
      // A cancel that arrived after the last dispatch still leaves a complete book
      return {
        ...context,
        status: action.delivered >= action.total ? 'COMPLETED' : 'CANCELLED',
        finishedAt: action.now ?? Date.now()
      }
    }

    default:
      return context
  }
}
