// FSM Types
export type {
  // Chunk states
  ChunkState,
  QueuedState,
  AttemptingState,
  DeliveredState,
  ExhaustedState,
  AttemptFailure,
  ChunkAction,

  // Job states
  JobStatus,
  JobAction,
  JobContext,

  // Error types
  BaseError,
  EngineError,
  InitializationError,
  ErrorType
} from './types'

// Constants
export { initialChunkState, createJobContext } from './types'

// Reducers
export { chunkReducer, jobReducer, awaitingRetry, isTerminal } from './reducer'

// Error classifier
export {
  classifyEngineError,
  classifyInitializationError,
  getErrorMessage,
  getRecoverySuggestion
} from './errorClassifier'
