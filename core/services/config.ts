import fs from 'fs'
import path from 'path'
import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'
import {
  ASSEMBLY_DEFAULTS,
  CHUNKING_DEFAULTS,
  CODEC_DEFAULTS,
  COORDINATOR_DEFAULTS,
  SYNTHESIS_DEFAULTS
} from '../../src/constants'
import { ConfigError } from './errors'
import { DEFAULT_VOICE_PRESET, getVoicePreset } from './tts/voices'
import type { VoiceParams } from './tts/types'

// ============= Schema =============

const CodecSchema = z.object({
  base: z.number().int().nonnegative().default(CODEC_DEFAULTS.base),
  alphabetSize: z.number().int().positive().default(CODEC_DEFAULTS.alphabetSize),
  codeStartId: z.number().int().nonnegative().default(CODEC_DEFAULTS.codeStartId),
  codeEndId: z.number().int().nonnegative().default(CODEC_DEFAULTS.codeEndId)
})

// Explicit fields override the preset's
const VoiceSchema = z.object({
  preset: z.string().min(1).default(DEFAULT_VOICE_PRESET),
  description: z.string().min(1).optional(),
  temperature: z.number().positive().optional(),
  topP: z.number().gt(0).max(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  repetitionPenalty: z.number().positive().optional()
})

export const PipelineConfigSchema = z.object({
  maxWords: z.number().int().positive().default(CHUNKING_DEFAULTS.maxWords),
  maxChars: z.number().int().positive().default(CHUNKING_DEFAULTS.maxChars),
  minRms: z.number().nonnegative().default(SYNTHESIS_DEFAULTS.minRms),
  maxAttempts: z.number().int().positive().default(SYNTHESIS_DEFAULTS.maxAttempts),
  retryDelayMs: z.number().int().nonnegative().default(SYNTHESIS_DEFAULTS.retryDelayMs),
  trimSamples: z.number().int().nonnegative().default(SYNTHESIS_DEFAULTS.trimSamples),
  fadeSamples: z.number().int().nonnegative().default(SYNTHESIS_DEFAULTS.fadeSamples),
  workers: z.number().int().positive().default(COORDINATOR_DEFAULTS.workers),
  maxBuffered: z.number().int().positive().optional(),
  chunkGapS: z.number().nonnegative().default(ASSEMBLY_DEFAULTS.chunkGapS),
  chapterGapS: z.number().nonnegative().default(ASSEMBLY_DEFAULTS.chapterGapS),
  codec: CodecSchema.default({}),
  voice: VoiceSchema.default({}),
  inferenceUrl: z.string().url().default('http://127.0.0.1:5050'),
  requestTimeoutMs: z.number().int().positive().default(360000),
  // Started by the pipeline when set; otherwise the server is expected to be running
  serverCommand: z.string().min(1).optional(),
  serverArgs: z.array(z.string()).default([]),
  outputDir: z.string().min(1).default('./output'),
  outputFormat: z.enum(['wav', 'm4b']).default('wav'),
  splitChapters: z.boolean().default(false),
  ffmpegPath: z.string().min(1).default('ffmpeg')
})

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>

// ============= Sources =============

type RawConfig = Record<string, unknown>

// Environment variable -> config key
const ENV_NUMBERS: Record<string, string> = {
  AUDIOBOOK_MAX_WORDS: 'maxWords',
  AUDIOBOOK_MAX_CHARS: 'maxChars',
  AUDIOBOOK_MIN_RMS: 'minRms',
  AUDIOBOOK_MAX_ATTEMPTS: 'maxAttempts',
  AUDIOBOOK_RETRY_DELAY_MS: 'retryDelayMs',
  AUDIOBOOK_WORKERS: 'workers',
  AUDIOBOOK_REQUEST_TIMEOUT_MS: 'requestTimeoutMs'
}

const ENV_STRINGS: Record<string, string> = {
  AUDIOBOOK_INFERENCE_URL: 'inferenceUrl',
  AUDIOBOOK_SERVER_COMMAND: 'serverCommand',
  AUDIOBOOK_OUTPUT_DIR: 'outputDir',
  AUDIOBOOK_OUTPUT_FORMAT: 'outputFormat',
  AUDIOBOOK_FFMPEG: 'ffmpegPath'
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {}

  for (const [name, key] of Object.entries(ENV_NUMBERS)) {
    const value = env[name]?.trim()
    // NaN is left for the schema to reject
    if (value) raw[key] = Number(value)
  }
  for (const [name, key] of Object.entries(ENV_STRINGS)) {
    const value = env[name]?.trim()
    if (value) raw[key] = value
  }

  const split = env.AUDIOBOOK_SPLIT_CHAPTERS?.trim().toLowerCase()
  if (split) raw.splitChapters = split === 'true' || split === '1' || split === 'yes'

  const preset = env.AUDIOBOOK_VOICE?.trim()
  if (preset) raw.voice = { preset }

  return raw
}

function readSettingsFile(settingsPath: string): RawConfig {
  if (!fs.existsSync(settingsPath)) {
    throw new ConfigError([`settings file not found: ${settingsPath}`])
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(settingsPath, 'utf-8'))
  } catch (error) {
    throw new ConfigError([`${settingsPath}: ${error instanceof Error ? error.message : String(error)}`])
  }
  if (!isRecord(parsed)) {
    throw new ConfigError([`${settingsPath}: expected a JSON object`])
  }
  return parsed
}

// Later sources win; nested objects merge one level deep
function mergeSources(...sources: RawConfig[]): RawConfig {
  const merged: RawConfig = {}
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      const existing = merged[key]
      merged[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value
    }
  }
  return merged
}

// ============= Loader =============

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv
  settingsPath?: string
  // Load .env into process.env first; off when env is passed explicitly
  dotenv?: boolean
  overrides?: RawConfig
}

export function loadConfig(options: LoadConfigOptions = {}): PipelineConfig {
  if (options.dotenv ?? options.env === undefined) {
    loadDotenv()
  }
  const env = options.env ?? process.env

  const settingsPath = options.settingsPath ?? env.AUDIOBOOK_SETTINGS?.trim()
  const fromFile = settingsPath ? readSettingsFile(path.resolve(settingsPath)) : {}

  const result = PipelineConfigSchema.safeParse(mergeSources(fromFile, readEnv(env), options.overrides ?? {}))
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    )
  }

  const parsed = result.data
  if (!getVoicePreset(parsed.voice.preset)) {
    throw new ConfigError([`voice.preset: unknown preset "${parsed.voice.preset}"`])
  }
  return parsed
}

/**
 * Voice params for a loaded config: the named preset with any explicit fields on top
 */
export function resolveVoice(config: PipelineConfig): VoiceParams {
  const preset = getVoicePreset(config.voice.preset)
  if (!preset) {
    throw new ConfigError([`voice.preset: unknown preset "${config.voice.preset}"`])
  }
  return {
    description: config.voice.description ?? preset.description,
    temperature: config.voice.temperature ?? preset.temperature,
    topP: config.voice.topP ?? preset.topP,
    maxTokens: config.voice.maxTokens ?? preset.maxTokens,
    repetitionPenalty: config.voice.repetitionPenalty ?? preset.repetitionPenalty
  }
}
