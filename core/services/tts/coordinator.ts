import { classifyEngineError, getErrorMessage, getRecoverySuggestion } from '../../../src/fsm/errorClassifier'
import { isTerminal, jobReducer } from '../../../src/fsm/reducer'
import { createJobContext, initialChunkState } from '../../../src/fsm/types'
import type { ChunkState, JobContext, JobStatus } from '../../../src/fsm/types'
import { CODEC_DEFAULTS, COORDINATOR_DEFAULTS, SYNTHESIS_DEFAULTS } from '../../../src/constants'
import { textPreview } from '../../../src/utils'
import { deriveSeed } from './synthesizer'
import type { SynthesisContext } from './synthesizer'
import { createDeferred } from './utils'
import type { Deferred } from './utils'
import type {
  ChapterPlan,
  PipelineJob,
  ProgressCallback,
  SynthesisResult,
  TextChunk,
  VoiceParams
} from './types'

/**
 * What the coordinator needs from a synthesizer. ChunkSynthesizer satisfies it;
 * tests pass lighter fakes.
 */
export interface ChunkSynthesis {
  readonly concurrencySafe: boolean
  synthesize(
    chunk: TextChunk,
    voice: VoiceParams,
    maxAttempts?: number,
    context?: SynthesisContext
  ): Promise<SynthesisResult>
}

export interface CoordinatorOptions {
  workers?: number
  // Max results held ahead of the next one to deliver; defaults to 4 * workers
  maxBuffered?: number
  maxAttempts?: number
  signal?: AbortSignal
  isCancelled?: () => boolean
  onProgress?: ProgressCallback
}

/**
 * Runs the synthesizer over every chunk of a book with a fixed worker pool and
 * hands results back strictly in global index order.
 *
 * One coordinator per conversion run.
 */
export class SynthesisCoordinator {
  private readonly synthesizer: ChunkSynthesis
  private readonly workers: number
  private readonly maxBuffered: number
  private readonly maxAttempts: number
  private readonly options: CoordinatorOptions
  private readonly cancelGate: Deferred<null> = createDeferred<null>()
  private jobContext: JobContext = createJobContext()
  private pipelineJob: PipelineJob = { chapters: [], chunks: new Map(), cancelled: false, failedChunkIndices: [] }
  private running = false

  constructor(synthesizer: ChunkSynthesis, options: CoordinatorOptions = {}) {
    this.synthesizer = synthesizer
    this.options = options
    this.workers = synthesizer.concurrencySafe
      ? Math.max(1, Math.floor(options.workers ?? COORDINATOR_DEFAULTS.workers))
      : 1
    this.maxBuffered = Math.max(1, Math.floor(options.maxBuffered ?? COORDINATOR_DEFAULTS.bufferPerWorker * this.workers))
    this.maxAttempts = options.maxAttempts ?? SYNTHESIS_DEFAULTS.maxAttempts

    if (!synthesizer.concurrencySafe && (options.workers ?? 1) > 1) {
      console.log('[Coordinator] Engine is not concurrency-safe, using a single worker')
    }
  }

  get workerCount(): number {
    return this.workers
  }

  get job(): PipelineJob {
    return this.pipelineJob
  }

  get status(): JobStatus {
    return this.jobContext.status
  }

  get cancelRequested(): boolean {
    return this.jobContext.cancelRequested
  }

  /**
   * Stop dispatching. Chunks already in flight finish and contiguous results
   * are still delivered.
   */
  cancel(): void {
    if (this.jobContext.cancelRequested) return
    this.jobContext = jobReducer(this.jobContext, { type: 'CANCEL_REQUESTED' })
    if (this.jobContext.cancelRequested) {
      console.log('[Coordinator] Cancellation requested')
    }
    this.cancelGate.resolve(null)
  }

  private checkCancelled(): boolean {
    if (!this.jobContext.cancelRequested) {
      if (this.options.signal?.aborted || this.options.isCancelled?.()) {
        this.cancel()
      }
    }
    return this.jobContext.cancelRequested
  }

  async *run(chapters: ChapterPlan[], voice: VoiceParams): AsyncGenerator<SynthesisResult, void, undefined> {
    if (this.running) {
      throw new Error('Coordinator is already running')
    }
    this.running = true

    const chunks = chapters.flatMap(chapter => chapter.chunks)
    const total = chunks.length
    const states = new Map<number, ChunkState>()
    chunks.forEach((_, index) => states.set(index, initialChunkState))
    this.pipelineJob = { chapters, chunks: states, cancelled: false, failedChunkIndices: [] }
    this.jobContext = { ...createJobContext(), cancelRequested: this.jobContext.cancelRequested }

    const onAbort = () => this.cancel()
    this.options.signal?.addEventListener('abort', onAbort, { once: true })

    // ============= Reorder Buffer =============
    const slots = chunks.map(() => createDeferred<SynthesisResult>())
    const dispatched = new Array<boolean>(total).fill(false)
    let nextChunkIndex = 0
    let delivered = 0
    let windowWaiters: Array<() => void> = []

    const wakeWindow = () => {
      const waiters = windowWaiters
      windowWaiters = []
      waiters.forEach(wake => wake())
    }

    const waitForWindow = async (index: number) => {
      while (!this.checkCancelled() && index >= delivered + this.maxBuffered) {
        await new Promise<void>(resolve => windowWaiters.push(resolve))
      }
    }

    void this.cancelGate.promise.then(wakeWindow)

    const synthesizeOne = async (index: number): Promise<SynthesisResult> => {
      const chunk = chunks[index]
      try {
        const result = await this.synthesizer.synthesize(chunk, voice, this.maxAttempts, {
          globalIndex: index,
          onStateChange: state => states.set(index, state)
        })
        // A synthesis that reports no state changes still settles its chunk
        const state = states.get(index)
        if (!state || !isTerminal(state)) {
          const failures = state && state.type !== 'QUEUED' ? state.failures : []
          states.set(index, result.qualityOk
            ? { type: 'DELIVERED', attemptsUsed: result.attemptsUsed, failures }
            : { type: 'EXHAUSTED', attemptsUsed: result.attemptsUsed, failures })
        }
        return result
      } catch (error) {
        const engineError = classifyEngineError(error)
        console.error(
          `[Coordinator] Chunk ${index} rejected: ${getErrorMessage(engineError)}. ${getRecoverySuggestion(engineError)}`
        )
        const previous = states.get(index)
        const attemptsUsed = previous?.type === 'ATTEMPTING' ? previous.attempt : 1
        states.set(index, {
          type: 'EXHAUSTED',
          attemptsUsed,
          failures: [
            ...(previous && previous.type !== 'QUEUED' ? previous.failures : []),
            { attempt: attemptsUsed, reason: 'engine_error', rms: 0, error: engineError }
          ]
        })
        return Object.freeze({
          chapterId: chunk.chapterId,
          chunkIndex: chunk.index,
          globalIndex: index,
          samples: new Float32Array(0),
          sampleRate: CODEC_DEFAULTS.sampleRate,
          rms: 0,
          attemptsUsed,
          qualityOk: false,
          engineError: engineError.message,
          seed: deriveSeed(chunk.text, voice, attemptsUsed),
          anomalies: 0
        })
      }
    }

    // ============= Worker Pool =============
    const processNextChunk = async (): Promise<void> => {
      while (true) {
        if (this.checkCancelled()) return
        if (nextChunkIndex >= total) return
        const currentIndex = nextChunkIndex++

        await waitForWindow(currentIndex)
        if (this.checkCancelled()) return

        dispatched[currentIndex] = true
        slots[currentIndex].resolve(await synthesizeOne(currentIndex))
      }
    }

    console.log(`[Coordinator] Synthesizing ${total} chunks with ${this.workers} worker(s)`)
    const pool = Promise.all(
      Array.from({ length: Math.min(this.workers, total) }, () => processNextChunk())
    )

    try {
      for (let index = 0; index < total; index++) {
        const slot = slots[index]
        if (!slot.settled()) {
          await Promise.race([slot.promise, this.cancelGate.promise])
        }
        if (!slot.settled()) {
          // Cancelled: wait for the chunk only if a worker already started it
          if (!dispatched[index]) break
        }
        const result = await slot.promise

        delivered++
        wakeWindow()
        this.options.onProgress?.(delivered, total, textPreview(chunks[index].text))
        yield result
      }
    } finally {
      // Consumer may stop early; never leave workers behind
      if (delivered < total) this.cancel()
      await pool
      this.options.signal?.removeEventListener('abort', onAbort)

      this.jobContext = jobReducer(this.jobContext, { type: 'FINISHED', delivered, total })
      this.pipelineJob.cancelled = this.jobContext.status === 'CANCELLED'
      console.log(`[Coordinator] ${this.jobContext.status}: delivered ${delivered} of ${total} chunks`)
      this.running = false
    }
  }
}
