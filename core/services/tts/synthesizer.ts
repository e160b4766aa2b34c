import { chunkReducer } from '../../../src/fsm/reducer'
import { classifyEngineError, classifyInitializationError, getErrorMessage } from '../../../src/fsm/errorClassifier'
import { initialChunkState } from '../../../src/fsm/types'
import type { ChunkState, ChunkAction } from '../../../src/fsm/types'
import { CODEC_DEFAULTS, SYNTHESIS_DEFAULTS, TOKENS_PER_FRAME } from '../../../src/constants'
import { sleep } from '../../../src/utils'
import { PipelineInitError } from '../errors'
import { computeRms, trimAndFade } from './audio'
import { sliceAudioSpan, unpackFrames } from './codec'
import { Mutex, hashToSeed } from './utils'
import type {
  InferenceEngine,
  InferencePrompt,
  SamplingParams,
  SynthesisResult,
  TextChunk,
  VoiceParams,
  WaveformCodec
} from './types'

export interface CodecLayout {
  base: number
  alphabetSize: number
  codeStartId?: number
  codeEndId?: number
}

export interface SynthesizerOptions {
  maxAttempts?: number
  minRms?: number
  // Wait after a thrown engine error before the next attempt
  retryDelayMs?: number
  trimSamples?: number
  fadeSamples?: number
  codec?: CodecLayout
}

export interface SynthesisContext {
  // Position of the chunk across the whole book; defaults to chunk.index
  globalIndex?: number
  onStateChange?: (state: ChunkState) => void
}

interface AttemptOutcome {
  samples: Float32Array
  sampleRate: number
  rms: number
  anomalies: number
  seed: number
  error: string | null
}

// Prompt envelope; the engine owns the wire format around it
export function buildPrompt(voice: VoiceParams, text: string): InferencePrompt {
  return {
    description: voice.description.trim(),
    text: text.trim()
  }
}

/**
 * Seed for one attempt. Attempt 1 hashes (text, voice) only, so identical input
 * reproduces across runs; later attempts mix in the attempt number.
 */
export function deriveSeed(text: string, voice: VoiceParams, attempt: number = 1): number {
  return attempt <= 1 ? hashToSeed(text, voice) : hashToSeed(text, voice, attempt)
}

export class ChunkSynthesizer {
  private readonly engine: InferenceEngine
  private readonly waveform: WaveformCodec
  private readonly maxAttempts: number
  private readonly minRms: number
  private readonly retryDelayMs: number
  private readonly trimSamples: number
  private readonly fadeSamples: number
  private readonly codec: CodecLayout
  // Guards reset+generate when the engine can't take concurrent callers
  private readonly lock: Mutex | null
  private lastSampleRate: number = CODEC_DEFAULTS.sampleRate

  constructor(engine: InferenceEngine, waveform: WaveformCodec, options: SynthesizerOptions = {}) {
    if (!engine.capabilities.supportsStateReset) {
      throw new PipelineInitError(
        classifyInitializationError('Engine does not support state reset; chunks would share context', 'inference')
      )
    }

    this.engine = engine
    this.waveform = waveform
    this.maxAttempts = Math.max(1, options.maxAttempts ?? SYNTHESIS_DEFAULTS.maxAttempts)
    this.minRms = options.minRms ?? SYNTHESIS_DEFAULTS.minRms
    this.retryDelayMs = options.retryDelayMs ?? SYNTHESIS_DEFAULTS.retryDelayMs
    this.trimSamples = options.trimSamples ?? SYNTHESIS_DEFAULTS.trimSamples
    this.fadeSamples = options.fadeSamples ?? SYNTHESIS_DEFAULTS.fadeSamples
    this.codec = options.codec ?? {
      base: CODEC_DEFAULTS.base,
      alphabetSize: CODEC_DEFAULTS.alphabetSize,
      codeStartId: CODEC_DEFAULTS.codeStartId,
      codeEndId: CODEC_DEFAULTS.codeEndId
    }
    this.lock = engine.capabilities.concurrencySafe ? null : new Mutex()
  }

  get concurrencySafe(): boolean {
    return this.lock === null
  }

  /**
   * Synthesize one chunk. Never throws for engine or quality failures: after
   * maxAttempts the last attempt comes back with qualityOk=false.
   */
  async synthesize(
    chunk: TextChunk,
    voice: VoiceParams,
    maxAttempts: number = this.maxAttempts,
    context: SynthesisContext = {}
  ): Promise<SynthesisResult> {
    const attempts = Math.max(1, maxAttempts)
    const label = `${chunk.chapterId}:${chunk.index}`
    let state: ChunkState = initialChunkState
    const transition = (action: ChunkAction) => {
      state = chunkReducer(state, action)
      context.onStateChange?.(state)
    }

    let last: AttemptOutcome | null = null

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const seed = deriveSeed(chunk.text, voice, attempt)
      transition({ type: 'ATTEMPT_STARTED', attempt, seed })

      try {
        last = await this.runAttempt(chunk, voice, seed, label)

        if (last.rms >= this.minRms) {
          transition({ type: 'ATTEMPT_PASSED', rms: last.rms })
          return this.toResult(chunk, context, last, attempt, true)
        }

        console.warn(
          `[Synthesizer] Chunk ${label} attempt ${attempt}/${attempts}: RMS ${last.rms.toFixed(6)} below ${this.minRms}`
        )
        transition({
          type: 'ATTEMPT_FAILED',
          failure: { attempt, reason: 'low_rms', rms: last.rms },
          maxAttempts: attempts
        })
      } catch (error) {
        const engineError = classifyEngineError(error)
        console.error(`[Synthesizer] Chunk ${label} attempt ${attempt}/${attempts}: ${getErrorMessage(engineError)}`)

        last = {
          samples: new Float32Array(0),
          sampleRate: this.lastSampleRate,
          rms: 0,
          anomalies: 0,
          seed,
          error: engineError.message
        }
        transition({
          type: 'ATTEMPT_FAILED',
          failure: { attempt, reason: 'engine_error', rms: 0, error: engineError },
          maxAttempts: attempts
        })

        if (attempt < attempts && this.retryDelayMs > 0) {
          await sleep(this.retryDelayMs)
        }
      }
    }

    console.warn(`[Synthesizer] Chunk ${label} failed quality gate after ${attempts} attempts, keeping last result`)
    const exhausted: AttemptOutcome = last ?? {
      samples: new Float32Array(0),
      sampleRate: this.lastSampleRate,
      rms: 0,
      anomalies: 0,
      seed: deriveSeed(chunk.text, voice, attempts),
      error: null
    }
    return this.toResult(chunk, context, exhausted, attempts, false)
  }

  private async runAttempt(
    chunk: TextChunk,
    voice: VoiceParams,
    seed: number,
    label: string
  ): Promise<AttemptOutcome> {
    const prompt = buildPrompt(voice, chunk.text)
    const sampling: SamplingParams = {
      temperature: voice.temperature,
      topP: voice.topP,
      maxTokens: voice.maxTokens,
      repetitionPenalty: voice.repetitionPenalty,
      seed
    }

    const tokens = await this.generateIsolated(prompt, sampling)
    const unpacked = unpackFrames(sliceAudioSpan(tokens, this.codec), this.codec.base, this.codec.alphabetSize)

    if (unpacked.anomalies > 0) {
      console.warn(`[Synthesizer] Chunk ${label}: ${unpacked.anomalies} out-of-range token(s) skipped`)
      if (unpacked.anomalies > unpacked.frames * TOKENS_PER_FRAME) {
        console.warn(`[Synthesizer] Chunk ${label}: mostly non-audio tokens, engine output looks degenerate`)
      }
    }

    if (unpacked.frames === 0) {
      return { samples: new Float32Array(0), sampleRate: this.lastSampleRate, rms: 0, anomalies: unpacked.anomalies, seed, error: null }
    }

    const decoded = await this.waveform.decode(unpacked.codes)
    this.lastSampleRate = decoded.sampleRate
    const samples = trimAndFade(decoded.samples, this.trimSamples, this.fadeSamples)

    return {
      samples,
      sampleRate: decoded.sampleRate,
      rms: computeRms(samples),
      anomalies: unpacked.anomalies,
      seed,
      error: null
    }
  }

  // reset + generate must not interleave with another caller's pair
  private generateIsolated(prompt: InferencePrompt, sampling: SamplingParams): Promise<number[]> {
    const run = async () => {
      await this.engine.resetState()
      return this.engine.generate(prompt, sampling)
    }
    return this.lock ? this.lock.runExclusive(run) : run()
  }

  private toResult(
    chunk: TextChunk,
    context: SynthesisContext,
    outcome: AttemptOutcome,
    attemptsUsed: number,
    qualityOk: boolean
  ): SynthesisResult {
    return Object.freeze({
      chapterId: chunk.chapterId,
      chunkIndex: chunk.index,
      globalIndex: context.globalIndex ?? chunk.index,
      samples: outcome.samples,
      sampleRate: outcome.sampleRate,
      rms: outcome.rms,
      attemptsUsed,
      qualityOk,
      engineError: outcome.error,
      seed: outcome.seed,
      anomalies: outcome.anomalies
    })
  }
}
