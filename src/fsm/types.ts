// ================== ERROR TYPES ==================

export type ErrorType =
  | 'resource_exhausted'
  | 'generation_error'
  | 'network_error'
  | 'timeout'
  | 'initialization_error'
  | 'unknown_error'

export interface BaseError {
  type: ErrorType
  message: string
  details?: string
  timestamp: string
}

export interface EngineError extends BaseError {
  type: 'resource_exhausted' | 'generation_error' | 'network_error' | 'timeout' | 'unknown_error'
}

export interface InitializationError extends BaseError {
  type: 'initialization_error'
  component: 'inference' | 'waveform' | 'exporter'
  cause: EngineError['type']
}

// ================== CHUNK STATES ==================

export interface QueuedState {
  type: 'QUEUED'
}

export interface AttemptingState {
  type: 'ATTEMPTING'
  attempt: number
  seed: number
  // Failures recorded on earlier attempts of this chunk
  failures: AttemptFailure[]
}

export interface DeliveredState {
  type: 'DELIVERED'
  attemptsUsed: number
  failures: AttemptFailure[]
}

export interface ExhaustedState {
  type: 'EXHAUSTED'
  attemptsUsed: number
  failures: AttemptFailure[]
}

export type ChunkState =
  | QueuedState
  | AttemptingState
  | DeliveredState
  | ExhaustedState

export interface AttemptFailure {
  attempt: number
  reason: 'low_rms' | 'engine_error'
  rms: number
  error?: EngineError
}

// ================== CHUNK ACTIONS ==================

export type ChunkAction =
  | { type: 'ATTEMPT_STARTED'; attempt: number; seed: number }
  | { type: 'ATTEMPT_PASSED'; rms: number }
  | { type: 'ATTEMPT_FAILED'; failure: AttemptFailure; maxAttempts: number }

// ================== JOB STATES ==================

export type JobStatus = 'RUNNING' | 'COMPLETED' | 'CANCELLED'

export type JobAction =
  | { type: 'CANCEL_REQUESTED' }
  | { type: 'FINISHED'; delivered: number; total: number; now?: number }

export interface JobContext {
  status: JobStatus
  cancelRequested: boolean
  startedAt: number
  finishedAt: number | null
}

export const initialChunkState: ChunkState = { type: 'QUEUED' }

export function createJobContext(now: number = Date.now()): JobContext {
  return {
    status: 'RUNNING',
    cancelRequested: false,
    startedAt: now,
    finishedAt: null
  }
}
