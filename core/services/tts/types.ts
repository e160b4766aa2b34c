import type { ChunkState } from '../../../src/fsm/types'

export interface TextChunk {
  chapterId: number
  // 0-based and contiguous within a chapter
  index: number
  text: string
  // Annotation markers are excluded from both counts
  wordCount: number
  charCount: number
}

export interface HierarchicalCode {
  l1: number[]
  l2: number[]
  l3: number[]
}

export interface UnpackResult {
  codes: HierarchicalCode
  frames: number
  // Tokens outside [base, base + 7 * alphabetSize)
  anomalies: number
  // Valid tokens dropped with a trailing partial frame
  discarded: number
}

export interface VoiceParams {
  description: string
  temperature: number
  topP: number
  maxTokens: number
  repetitionPenalty: number
}

export interface SamplingParams {
  temperature: number
  topP: number
  maxTokens: number
  repetitionPenalty: number
  seed: number
}

export interface InferencePrompt {
  description: string
  text: string
}

export interface EngineCapabilities {
  concurrencySafe: boolean
  supportsStateReset: boolean
}

/**
 * Text-to-token model. One handle is constructed by the caller, initialized once
 * and shared by every chunk of a job.
 */
export interface InferenceEngine {
  readonly capabilities: EngineCapabilities
  init(): Promise<void>
  // Drop any recurrent/causal state left over from the previous generate call
  resetState(): Promise<void>
  generate(prompt: InferencePrompt, sampling: SamplingParams): Promise<number[]>
  shutdown(): Promise<void>
}

export interface DecodedAudio {
  samples: Float32Array
  sampleRate: number
}

export interface WaveformCodec {
  init(): Promise<void>
  decode(codes: HierarchicalCode): Promise<DecodedAudio>
  shutdown(): Promise<void>
}

export interface SynthesisResult {
  readonly chapterId: number
  readonly chunkIndex: number
  readonly globalIndex: number
  readonly samples: Float32Array
  readonly sampleRate: number
  readonly rms: number
  readonly attemptsUsed: number
  readonly qualityOk: boolean
  readonly engineError: string | null
  readonly seed: number
  readonly anomalies: number
}

export interface TimelineSegment {
  readonly chunkIndex: number
  readonly startS: number
  readonly endS: number
}

// Frozen once the chapter closes
export interface ChapterTimeline {
  readonly chapterId: number
  readonly title: string
  readonly segments: readonly TimelineSegment[]
  readonly startS: number
  readonly endS: number
  readonly totalDurationS: number
}

export interface ExportOutput {
  outputs: string[]
}

export interface AudioExporter {
  write(chapterId: number, samples: Float32Array, sampleRate: number): Promise<void>
  finalize(timelines: ChapterTimeline[], totalDurationS: number): Promise<ExportOutput>
  // Release open files and drop partial output after a failed run
  abort(): Promise<void>
}

export interface ChapterInput {
  title: string
  text: string
}

export interface ChapterPlan {
  id: number
  title: string
  chunks: TextChunk[]
}

export interface PipelineJob {
  chapters: ChapterPlan[]
  // Keyed by global chunk index
  chunks: Map<number, ChunkState>
  cancelled: boolean
  failedChunkIndices: number[]
}

export type ProgressCallback = (completed: number, total: number, preview: string) => void
