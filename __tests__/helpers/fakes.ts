import { packFrames } from '../../core/services/tts/codec'
import type { ChunkSynthesis } from '../../core/services/tts/coordinator'
import type { SynthesisContext } from '../../core/services/tts/synthesizer'
import type {
  AudioExporter,
  ChapterTimeline,
  DecodedAudio,
  EngineCapabilities,
  ExportOutput,
  HierarchicalCode,
  InferenceEngine,
  InferencePrompt,
  SamplingParams,
  SynthesisResult,
  TextChunk,
  VoiceParams,
  WaveformCodec
} from '../../core/services/tts/types'
import { sleep } from '../../src/utils'

export const TEST_CODEC = { base: 1000, alphabetSize: 16 }

export const TEST_VOICE: VoiceParams = {
  description: 'A test narrator.',
  temperature: 0.5,
  topP: 0.9,
  maxTokens: 1000,
  repetitionPenalty: 1.1
}

export function makeChunks(count: number, chapterId: number = 0, startIndex: number = 0): TextChunk[] {
  return Array.from({ length: count }, (_, i) => {
    const text = `Chunk number ${startIndex + i} of chapter ${chapterId}.`
    return {
      chapterId,
      index: startIndex + i,
      text,
      wordCount: text.split(' ').length,
      charCount: text.length
    }
  })
}

export function makeResult(overrides: Partial<SynthesisResult> & { globalIndex: number }): SynthesisResult {
  return {
    chapterId: 0,
    chunkIndex: overrides.globalIndex,
    samples: new Float32Array(100).fill(0.5),
    sampleRate: 1000,
    rms: 0.5,
    attemptsUsed: 1,
    qualityOk: true,
    engineError: null,
    seed: 1,
    anomalies: 0,
    ...overrides
  }
}

// ============= Engine =============

export interface FakeEngineOptions {
  capabilities?: Partial<EngineCapabilities>
  frames?: number
  generateDelayMs?: number
  respond?: (prompt: InferencePrompt, sampling: SamplingParams, call: number) => number[] | Promise<number[]>
  initError?: Error
}

export class FakeEngine implements InferenceEngine {
  readonly capabilities: EngineCapabilities
  readonly calls: Array<{ prompt: InferencePrompt; sampling: SamplingParams }> = []
  readonly events: string[] = []
  initCalls = 0
  shutdownCalls = 0
  private readonly options: FakeEngineOptions

  constructor(options: FakeEngineOptions = {}) {
    this.options = options
    this.capabilities = {
      concurrencySafe: options.capabilities?.concurrencySafe ?? false,
      supportsStateReset: options.capabilities?.supportsStateReset ?? true
    }
  }

  async init(): Promise<void> {
    this.initCalls++
    if (this.options.initError) throw this.options.initError
  }

  async resetState(): Promise<void> {
    this.events.push('reset')
  }

  async generate(prompt: InferencePrompt, sampling: SamplingParams): Promise<number[]> {
    this.calls.push({ prompt, sampling })
    this.events.push('generate:start')
    if (this.options.generateDelayMs) {
      await sleep(this.options.generateDelayMs)
    }
    this.events.push('generate:end')

    if (this.options.respond) {
      return this.options.respond(prompt, sampling, this.calls.length)
    }
    return packFrames(codesFromSeed(sampling.seed, this.options.frames ?? 4), TEST_CODEC.base, TEST_CODEC.alphabetSize)
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls++
  }
}

export function codesFromSeed(seed: number, frames: number): HierarchicalCode {
  const size = TEST_CODEC.alphabetSize
  return {
    l1: Array.from({ length: frames }, (_, i) => (seed + i) % size),
    l2: Array.from({ length: frames * 2 }, (_, i) => (seed + 3 * i) % size),
    l3: Array.from({ length: frames * 4 }, (_, i) => (seed + 5 * i) % size)
  }
}

// ============= Waveform =============

export interface FakeWaveformOptions {
  samplesPerFrame?: number
  amplitude?: number
  sampleRate?: number
  initError?: Error
}

export class FakeWaveform implements WaveformCodec {
  readonly decoded: HierarchicalCode[] = []
  shutdownCalls = 0
  private readonly options: FakeWaveformOptions

  constructor(options: FakeWaveformOptions = {}) {
    this.options = options
  }

  async init(): Promise<void> {
    if (this.options.initError) throw this.options.initError
  }

  async decode(codes: HierarchicalCode): Promise<DecodedAudio> {
    this.decoded.push(codes)
    const length = codes.l1.length * (this.options.samplesPerFrame ?? 100)
    return {
      samples: new Float32Array(length).fill(this.options.amplitude ?? 0.5),
      sampleRate: this.options.sampleRate ?? 1000
    }
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls++
  }
}

// ============= Exporter =============

export class FakeExporter implements AudioExporter {
  readonly writes: Array<{ chapterId: number; length: number; sampleRate: number; first: number }> = []
  finalized: { timelines: ChapterTimeline[]; totalDurationS: number } | null = null
  aborted = false
  private readonly failOnWrite: number | null
  private readonly writeError: Error

  // failOnWrite: 1-based write call that rejects
  constructor(options: { failOnWrite?: number; writeError?: Error } = {}) {
    this.failOnWrite = options.failOnWrite ?? null
    this.writeError = options.writeError ?? new Error('ENOSPC: no space left on device')
  }

  async write(chapterId: number, samples: Float32Array, sampleRate: number): Promise<void> {
    if (this.failOnWrite === this.writes.length + 1) {
      throw this.writeError
    }
    this.writes.push({ chapterId, length: samples.length, sampleRate, first: samples.length > 0 ? samples[0] : 0 })
  }

  async finalize(timelines: ChapterTimeline[], totalDurationS: number): Promise<ExportOutput> {
    this.finalized = { timelines, totalDurationS }
    return { outputs: ['book.wav'] }
  }

  async abort(): Promise<void> {
    this.aborted = true
  }

  samplesFor(chapterId: number): number {
    return this.writes
      .filter(write => write.chapterId === chapterId)
      .reduce((sum, write) => sum + write.length, 0)
  }
}

// ============= Scripted Synthesis =============

export interface ScriptedSynthesisOptions {
  concurrencySafe?: boolean
  delayFor?: (globalIndex: number) => number
  failFor?: (globalIndex: number) => boolean
  onFinish?: (globalIndex: number) => void
}

/**
 * Stand-in for ChunkSynthesizer that sleeps a scripted time per chunk
 */
export class ScriptedSynthesis implements ChunkSynthesis {
  readonly concurrencySafe: boolean
  readonly started: number[] = []
  readonly finished: number[] = []
  active = 0
  maxActive = 0
  private readonly options: ScriptedSynthesisOptions

  constructor(options: ScriptedSynthesisOptions = {}) {
    this.options = options
    this.concurrencySafe = options.concurrencySafe ?? true
  }

  async synthesize(
    chunk: TextChunk,
    _voice: VoiceParams,
    _maxAttempts?: number,
    context: SynthesisContext = {}
  ): Promise<SynthesisResult> {
    const globalIndex = context.globalIndex ?? chunk.index
    this.started.push(globalIndex)
    this.active++
    this.maxActive = Math.max(this.maxActive, this.active)
    try {
      await sleep(this.options.delayFor?.(globalIndex) ?? 1)
      this.options.onFinish?.(globalIndex)
      if (this.options.failFor?.(globalIndex)) {
        throw new Error('Generation failed: scripted')
      }
      this.finished.push(globalIndex)
      return makeResult({ chapterId: chunk.chapterId, chunkIndex: chunk.index, globalIndex })
    } finally {
      this.active--
    }
  }
}

// Deterministic pseudo-random sequence for delay scripts
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0
    return state / 0x100000000
  }
}
