import { classifyInitializationError } from '../src/fsm/errorClassifier'
import type { JobStatus } from '../src/fsm/types'
import { loadConfig, resolveVoice } from './services/config'
import type { PipelineConfig } from './services/config'
import { PipelineInitError } from './services/errors'
import {
  ChapterAssembler,
  ChunkSynthesizer,
  HttpInferenceEngine,
  HttpWaveformCodec,
  InferenceServerProcess,
  ProgressTracker,
  SynthesisCoordinator,
  WavFileExporter,
  chunkText,
  cleanupTempAudio,
  normalizeText
} from './services/tts'
import type {
  AudioExporter,
  ChapterInput,
  ChapterPlan,
  ChapterTimeline,
  InferenceEngine,
  ProgressCallback,
  ProgressSnapshot,
  VoiceParams,
  WaveformCodec
} from './services/tts'

export { loadConfig, resolveVoice, PipelineConfigSchema } from './services/config'
export type { PipelineConfig, LoadConfigOptions } from './services/config'
export { PipelineInitError, ConfigError } from './services/errors'
export * from './services/tts'

export interface BookInput {
  title: string
  chapters: ChapterInput[]
}

export interface ConvertOptions {
  voice?: VoiceParams
  onProgress?: ProgressCallback
  onStatus?: (snapshot: ProgressSnapshot) => void
  signal?: AbortSignal
  isCancelled?: () => boolean
}

export interface ConversionResult {
  outputs: string[]
  failedChunkIndices: number[]
  timelines: ChapterTimeline[]
  totalDurationS: number
  cancelled: boolean
  status: JobStatus
}

// An external process the engine and codec talk to
export interface ServerLifecycle {
  start(): Promise<void>
  stop(): Promise<void>
}

export interface PipelineDeps {
  server?: ServerLifecycle
  engine: InferenceEngine
  waveform: WaveformCodec
  // A fresh exporter per conversion; exporters are single use
  createExporter: (bookTitle: string) => AudioExporter
  config: PipelineConfig
}

export function planChapters(chapters: ChapterInput[], maxWords: number, maxChars: number): ChapterPlan[] {
  return chapters.map((chapter, id) => ({
    id,
    title: chapter.title,
    chunks: chunkText(normalizeText(chapter.text), maxWords, maxChars, id)
  }))
}

/**
 * Owns the engine and codec handles for their whole lifetime:
 * init once, convert any number of books, shutdown once.
 */
export class AudiobookPipeline {
  private readonly deps: PipelineDeps
  private synthesizer: ChunkSynthesizer | null = null
  private activeCoordinator: SynthesisCoordinator | null = null

  constructor(deps: PipelineDeps) {
    this.deps = deps
  }

  get initialized(): boolean {
    return this.synthesizer !== null
  }

  async init(): Promise<void> {
    if (this.synthesizer) return
    const { server, engine, waveform, config } = this.deps

    if (server) {
      try {
        await server.start()
      } catch (error) {
        throw new PipelineInitError(classifyInitializationError(error, 'inference'))
      }
    }

    try {
      await engine.init()
    } catch (error) {
      throw new PipelineInitError(classifyInitializationError(error, 'inference'))
    }

    try {
      await waveform.init()
    } catch (error) {
      throw new PipelineInitError(classifyInitializationError(error, 'waveform'))
    }

    this.synthesizer = new ChunkSynthesizer(engine, waveform, {
      maxAttempts: config.maxAttempts,
      minRms: config.minRms,
      retryDelayMs: config.retryDelayMs,
      trimSamples: config.trimSamples,
      fadeSamples: config.fadeSamples,
      codec: config.codec
    })
    console.log('[Pipeline] Initialized')
  }

  async convert(book: BookInput, options: ConvertOptions = {}): Promise<ConversionResult> {
    const synthesizer = this.synthesizer
    if (!synthesizer) {
      throw new Error('Pipeline not initialized')
    }
    if (this.activeCoordinator) {
      throw new Error('A conversion is already running')
    }

    const { config } = this.deps
    const voice = options.voice ?? resolveVoice(config)
    const plans = planChapters(book.chapters, config.maxWords, config.maxChars)
    const total = plans.reduce((sum, plan) => sum + plan.chunks.length, 0)
    console.log(`[Pipeline] "${book.title}": ${plans.length} chapter(s), ${total} chunk(s)`)

    const tracker = new ProgressTracker(total)
    const coordinator = new SynthesisCoordinator(synthesizer, {
      workers: config.workers,
      maxBuffered: config.maxBuffered,
      maxAttempts: config.maxAttempts,
      signal: options.signal,
      isCancelled: options.isCancelled,
      onProgress: (completed, count, preview) => {
        options.onProgress?.(completed, count, preview)
        options.onStatus?.(tracker.update(completed, preview))
      }
    })

    const assembler = new ChapterAssembler(
      this.deps.createExporter(book.title),
      new Map(plans.map(plan => [plan.id, plan.title])),
      {
        chunkGapS: config.chunkGapS,
        chapterGapS: config.chapterGapS,
        onDegradedChunk: result => coordinator.job.failedChunkIndices.push(result.globalIndex)
      }
    )

    this.activeCoordinator = coordinator
    try {
      const assembled = await assembler.consume(coordinator.run(plans, voice))
      return {
        outputs: assembled.outputs,
        failedChunkIndices: [...coordinator.job.failedChunkIndices],
        timelines: assembled.timelines,
        totalDurationS: assembled.totalDurationS,
        cancelled: coordinator.job.cancelled,
        status: coordinator.status
      }
    } finally {
      this.activeCoordinator = null
    }
  }

  // Cooperative: in-flight chunks finish and are still written
  cancel(): void {
    this.activeCoordinator?.cancel()
  }

  async shutdown(): Promise<void> {
    this.activeCoordinator?.cancel()
    this.synthesizer = null
    await this.deps.waveform.shutdown()
    await this.deps.engine.shutdown()
    await this.deps.server?.stop()
    await cleanupTempAudio()
    console.log('[Pipeline] Shut down')
  }
}

/**
 * Pipeline wired to the local HTTP inference server and the WAV/m4b exporter
 */
export function createHttpPipeline(config: PipelineConfig = loadConfig()): AudiobookPipeline {
  const client = { baseUrl: config.inferenceUrl, requestTimeoutMs: config.requestTimeoutMs }
  const server = config.serverCommand
    ? new InferenceServerProcess({ command: config.serverCommand, args: config.serverArgs, baseUrl: config.inferenceUrl })
    : undefined
  return new AudiobookPipeline({
    server,
    engine: new HttpInferenceEngine(client),
    waveform: new HttpWaveformCodec(client),
    createExporter: bookTitle => new WavFileExporter({
      outputDir: config.outputDir,
      bookTitle,
      format: config.outputFormat,
      splitChapters: config.splitChapters,
      ffmpegPath: config.ffmpegPath
    }),
    config
  })
}
