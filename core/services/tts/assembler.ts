import { ASSEMBLY_DEFAULTS } from '../../../src/constants'
import { formatTimestamp } from '../../../src/utils'
import { resampleLinear } from './audio'
import type {
  AudioExporter,
  ChapterTimeline,
  SynthesisResult,
  TimelineSegment
} from './types'

export interface AssemblerOptions {
  chunkGapS?: number
  chapterGapS?: number
  // Output rate; taken from the first result when omitted
  sampleRate?: number
  onDegradedChunk?: (result: SynthesisResult) => void
}

export interface AssemblyResult {
  outputs: string[]
  timelines: ChapterTimeline[]
  totalDurationS: number
  failedChunkIndices: number[]
}

interface OpenChapter {
  chapterId: number
  title: string
  startS: number
  segments: TimelineSegment[]
}

// Silence owed to a chapter before the output rate is known
interface PendingSilence {
  chapterId: number
  seconds: number
}

/**
 * Writes ordered synthesis results to the exporter as they arrive and builds
 * chapter timelines on the way. Only one chunk's samples are held at a time.
 */
export class ChapterAssembler {
  private readonly exporter: AudioExporter
  private readonly titles: Map<number, string>
  private readonly chunkGapS: number
  private readonly chapterGapS: number
  private readonly onDegradedChunk?: (result: SynthesisResult) => void
  private sampleRate: number | null
  // Rate carried by empty results, used if no result ever has audio
  private fallbackRate: number | null = null
  private samplesWritten = 0
  private pendingSilence: PendingSilence[] = []
  private lastGlobalIndex = -1
  private current: OpenChapter | null = null
  private readonly timelines: ChapterTimeline[] = []
  private readonly failed: number[] = []
  private finished = false

  constructor(
    exporter: AudioExporter,
    titles: Map<number, string>,
    options: AssemblerOptions = {}
  ) {
    this.exporter = exporter
    this.titles = titles
    this.chunkGapS = Math.max(0, options.chunkGapS ?? ASSEMBLY_DEFAULTS.chunkGapS)
    this.chapterGapS = Math.max(0, options.chapterGapS ?? ASSEMBLY_DEFAULTS.chapterGapS)
    this.sampleRate = options.sampleRate ?? null
    this.onDegradedChunk = options.onDegradedChunk
  }

  get failedChunkIndices(): number[] {
    return [...this.failed]
  }

  /**
   * Drain an ordered result stream and finalize the export. On any failure the
   * exporter is aborted before the error propagates.
   */
  async consume(results: AsyncIterable<SynthesisResult>): Promise<AssemblyResult> {
    try {
      for await (const result of results) {
        await this.append(result)
      }
      return await this.finish()
    } catch (error) {
      await this.abort()
      throw error
    }
  }

  async append(result: SynthesisResult): Promise<void> {
    if (this.finished) {
      throw new Error('Assembler already finished')
    }
    if (result.globalIndex <= this.lastGlobalIndex) {
      throw new Error(`Out-of-order result: ${result.globalIndex} after ${this.lastGlobalIndex}`)
    }
    this.lastGlobalIndex = result.globalIndex

    if (this.current && this.current.chapterId !== result.chapterId) {
      await this.writeSilence(this.current.chapterId, this.chapterGapS)
      this.closeChapter()
    }

    if (!this.current) {
      this.current = {
        chapterId: result.chapterId,
        title: this.titles.get(result.chapterId) ?? `Chapter ${result.chapterId + 1}`,
        startS: this.positionS(),
        segments: []
      }
    } else {
      await this.writeSilence(result.chapterId, this.chunkGapS)
    }

    if (!result.qualityOk) {
      console.warn(
        `[Assembler] Chunk ${result.globalIndex} degraded after ${result.attemptsUsed} attempt(s)` +
        (result.engineError ? `: ${result.engineError}` : '')
      )
      this.failed.push(result.globalIndex)
      this.onDegradedChunk?.(result)
    }

    // An empty result carries a fallback rate; only real audio fixes the output rate
    if (this.sampleRate === null) {
      if (result.samples.length === 0) {
        this.fallbackRate = result.sampleRate
      } else {
        await this.fixSampleRate(result.sampleRate)
      }
    }

    const startS = this.positionS()
    const rate = this.sampleRate
    if (rate !== null && result.samples.length > 0) {
      const samples = result.sampleRate === rate
        ? result.samples
        : resampleLinear(result.samples, result.sampleRate, rate)
      await this.exporter.write(result.chapterId, samples, rate)
      this.samplesWritten += samples.length
    }

    this.current.segments.push(Object.freeze({
      chunkIndex: result.chunkIndex,
      startS,
      endS: this.positionS()
    }))
  }

  async finish(): Promise<AssemblyResult> {
    if (this.finished) {
      throw new Error('Assembler already finished')
    }
    this.finished = true

    if (this.sampleRate === null && this.fallbackRate !== null && this.pendingSilence.length > 0) {
      await this.fixSampleRate(this.fallbackRate)
    }

    // No trailing gap after the last chapter
    this.closeChapter()
    const totalDurationS = this.positionS()

    console.log(`[Assembler] ${this.timelines.length} chapter(s), ${totalDurationS.toFixed(2)}s total`)
    const { outputs } = await this.exporter.finalize([...this.timelines], totalDurationS)

    return {
      outputs,
      timelines: [...this.timelines],
      totalDurationS,
      failedChunkIndices: this.failedChunkIndices
    }
  }

  /**
   * Stop assembling and let the exporter drop its partial output.
   */
  async abort(): Promise<void> {
    this.finished = true
    this.current = null
    this.pendingSilence = []
    await this.exporter.abort()
  }

  private positionS(): number {
    const written = this.sampleRate ? this.samplesWritten / this.sampleRate : 0
    return this.pendingSilence.reduce((sum, gap) => sum + gap.seconds, written)
  }

  private async fixSampleRate(rate: number): Promise<void> {
    this.sampleRate = rate
    const owed = this.pendingSilence
    this.pendingSilence = []
    for (const gap of owed) {
      await this.writeSilence(gap.chapterId, gap.seconds)
    }
  }

  private async writeSilence(chapterId: number, seconds: number): Promise<void> {
    if (seconds <= 0) return
    const rate = this.sampleRate
    if (!rate) {
      this.pendingSilence.push({ chapterId, seconds })
      return
    }
    const length = Math.round(seconds * rate)
    if (length === 0) return
    await this.exporter.write(chapterId, new Float32Array(length), rate)
    this.samplesWritten += length
  }

  private closeChapter(): void {
    const chapter = this.current
    if (!chapter) return
    this.current = null

    const endS = this.positionS()
    this.timelines.push(Object.freeze({
      chapterId: chapter.chapterId,
      title: chapter.title,
      segments: Object.freeze([...chapter.segments]),
      startS: chapter.startS,
      endS,
      totalDurationS: endS - chapter.startS
    }))
    console.log(`[Assembler] Chapter "${chapter.title}" ${formatTimestamp(chapter.startS)} - ${formatTimestamp(endS)}`)
  }
}
