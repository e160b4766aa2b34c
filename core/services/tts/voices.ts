import { z } from 'zod'
import presetData from '../../../data/voice-presets.json'
import type { VoiceParams } from './types'

const VoicePresetSchema = z.object({
  label: z.string().min(1),
  description: z.string().min(1),
  temperature: z.number().positive(),
  topP: z.number().gt(0).max(1),
  maxTokens: z.number().int().positive(),
  repetitionPenalty: z.number().positive()
})

export type VoicePreset = z.infer<typeof VoicePresetSchema> & { name: string }

const PRESETS: Record<string, z.infer<typeof VoicePresetSchema>> =
  z.record(VoicePresetSchema).parse(presetData)

export const DEFAULT_VOICE_PRESET = 'narrator'

export function listVoicePresets(): VoicePreset[] {
  return Object.entries(PRESETS).map(([name, preset]) => ({ name, ...preset }))
}

// Sampling params for a named preset, or null when the name is unknown
export function getVoicePreset(name: string): VoiceParams | null {
  const preset = PRESETS[name.trim().toLowerCase()]
  if (!preset) return null
  return {
    description: preset.description,
    temperature: preset.temperature,
    topP: preset.topP,
    maxTokens: preset.maxTokens,
    repetitionPenalty: preset.repetitionPenalty
  }
}
