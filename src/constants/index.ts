// Frame layout of the hierarchical audio codec: 1 L1 + 2 L2 + 4 L3 codes per frame
export const TOKENS_PER_FRAME = 7

export const CODEC_DEFAULTS = {
  base: 128266,
  alphabetSize: 4096,
  codeStartId: 128257,
  codeEndId: 128258,
  sampleRate: 24000
} as const

export const CHUNKING_DEFAULTS = {
  maxWords: 70,
  maxChars: 1200
} as const

export const SYNTHESIS_DEFAULTS = {
  maxAttempts: 3,
  minRms: 1e-3,
  retryDelayMs: 1000,
  // Codec warm-up noise at the head of every decoded chunk
  trimSamples: 512,
  fadeSamples: 320
} as const

export const ASSEMBLY_DEFAULTS = {
  chunkGapS: 0.25,
  chapterGapS: 2.0
} as const

export const COORDINATOR_DEFAULTS = {
  workers: 4,
  // Reorder-buffer look-ahead per worker
  bufferPerWorker: 4
} as const
