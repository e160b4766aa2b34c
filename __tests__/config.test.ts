import fs from 'fs'
import os from 'os'
import path from 'path'
import { describe, it, expect, afterEach } from 'vitest'
import { loadConfig, resolveVoice } from '../core/services/config'
import { ConfigError } from '../core/services/errors'
import { getVoicePreset, listVoicePresets } from '../core/services/tts/voices'

const tempDirs: string[] = []

function writeSettings(content: unknown): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'audiobook-config-'))
  tempDirs.push(dir)
  const file = path.join(dir, 'settings.json')
  fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content))
  return file
}

function configError(fn: () => unknown): ConfigError {
  try {
    fn()
  } catch (error) {
    if (error instanceof ConfigError) return error
    throw error
  }
  throw new Error('Expected a ConfigError')
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
})

describe('loadConfig', () => {
  it('fills every default from an empty environment', () => {
    const config = loadConfig({ env: {} })

    expect(config).toMatchObject({
      maxWords: 70,
      maxChars: 1200,
      minRms: 0.001,
      maxAttempts: 3,
      retryDelayMs: 1000,
      workers: 4,
      chunkGapS: 0.25,
      chapterGapS: 2,
      trimSamples: 512,
      fadeSamples: 320,
      inferenceUrl: 'http://127.0.0.1:5050',
      requestTimeoutMs: 360000,
      outputDir: './output',
      outputFormat: 'wav',
      splitChapters: false,
      ffmpegPath: 'ffmpeg'
    })
    expect(config.codec).toEqual({ base: 128266, alphabetSize: 4096, codeStartId: 128257, codeEndId: 128258 })
    expect(config.voice).toEqual({ preset: 'narrator' })
    expect(config.maxBuffered).toBeUndefined()
  })

  it('reads overrides from environment variables', () => {
    const config = loadConfig({
      env: {
        AUDIOBOOK_WORKERS: '2',
        AUDIOBOOK_OUTPUT_FORMAT: 'm4b',
        AUDIOBOOK_SPLIT_CHAPTERS: 'true',
        AUDIOBOOK_INFERENCE_URL: 'http://localhost:9000',
        AUDIOBOOK_VOICE: 'documentary'
      }
    })

    expect(config.workers).toBe(2)
    expect(config.outputFormat).toBe('m4b')
    expect(config.splitChapters).toBe(true)
    expect(config.inferenceUrl).toBe('http://localhost:9000')
    expect(config.voice.preset).toBe('documentary')
  })

  it('merges a settings file under the environment', () => {
    const settingsPath = writeSettings({
      maxWords: 50,
      codec: { base: 10 },
      voice: { preset: 'bedtime', temperature: 0.3 }
    })

    const config = loadConfig({ env: { AUDIOBOOK_MAX_WORDS: '40', AUDIOBOOK_VOICE: 'storyteller' }, settingsPath })

    expect(config.maxWords).toBe(40)
    expect(config.codec).toEqual({ base: 10, alphabetSize: 4096, codeStartId: 128257, codeEndId: 128258 })
    expect(config.voice).toEqual({ preset: 'storyteller', temperature: 0.3 })
  })

  it('finds the settings file through AUDIOBOOK_SETTINGS', () => {
    const settingsPath = writeSettings({ chapterGapS: 1.5 })

    expect(loadConfig({ env: { AUDIOBOOK_SETTINGS: settingsPath } }).chapterGapS).toBe(1.5)
  })

  it('lists every invalid key', () => {
    const error = configError(() => loadConfig({
      env: { AUDIOBOOK_WORKERS: 'many', AUDIOBOOK_OUTPUT_FORMAT: 'mp3' }
    }))

    expect(error.issues.map(issue => issue.split(':')[0])).toEqual(['workers', 'outputFormat'])
    expect(error.message.startsWith('Invalid configuration:\n- workers:')).toBe(true)
  })

  it('rejects an unknown voice preset', () => {
    const error = configError(() => loadConfig({ env: { AUDIOBOOK_VOICE: 'robot' } }))

    expect(error.issues).toEqual(['voice.preset: unknown preset "robot"'])
  })

  it('rejects a missing or malformed settings file', () => {
    expect(() => loadConfig({ env: {}, settingsPath: '/nonexistent/settings.json' })).toThrow(ConfigError)
    expect(() => loadConfig({ env: {}, settingsPath: writeSettings('[1, 2]') })).toThrow(ConfigError)
    expect(() => loadConfig({ env: {}, settingsPath: writeSettings('{ nope') })).toThrow(ConfigError)
  })
})

describe('resolveVoice', () => {
  it('layers explicit voice fields over the preset', () => {
    const config = loadConfig({ env: {}, overrides: { voice: { preset: 'newsreader', topP: 0.5 } } })

    expect(resolveVoice(config)).toEqual({
      description: 'A confident broadcast newsreader with a clear mid-range voice and brisk, precise pacing.',
      temperature: 0.3,
      topP: 0.5,
      maxTokens: 2200,
      repetitionPenalty: 1.15
    })
  })
})

describe('voice presets', () => {
  it('loads the bundled presets', () => {
    const names = listVoicePresets().map(preset => preset.name)

    expect(names).toContain('narrator')
    expect(names).toHaveLength(8)
  })

  it('looks presets up case-insensitively', () => {
    expect(getVoicePreset(' Narrator ')?.temperature).toBe(0.45)
    expect(getVoicePreset('missing')).toBeNull()
  })
})
