// TTS pipeline services
export { chunkText, normalizeText } from './tts/chunker'
export { unpackFrames, packFrames, sliceAudioSpan } from './tts/codec'
export { ChunkSynthesizer, buildPrompt, deriveSeed } from './tts/synthesizer'
export type { SynthesizerOptions, SynthesisContext, CodecLayout } from './tts/synthesizer'
export { SynthesisCoordinator } from './tts/coordinator'
export type { ChunkSynthesis, CoordinatorOptions } from './tts/coordinator'
export { ChapterAssembler } from './tts/assembler'
export type { AssemblerOptions, AssemblyResult } from './tts/assembler'
export { WavFileExporter, formatChapterMetadata, buildWavHeader } from './tts/exporter'
export type { WavExporterOptions, OutputFormat } from './tts/exporter'
export {
  HttpInferenceEngine,
  HttpWaveformCodec,
  InferenceServerProcess,
  getServerStatus,
  waitForServer
} from './tts/server'
export type { HttpClientOptions, ServerProcessOptions, ServerStatus } from './tts/server'
export { ProgressTracker } from './tts/progress'
export type { ProgressSnapshot } from './tts/progress'
export { getVoicePreset, listVoicePresets, DEFAULT_VOICE_PRESET } from './tts/voices'
export type { VoicePreset } from './tts/voices'
export { cleanupTempAudio } from './tts/cleanup'
export type * from './tts/types'
