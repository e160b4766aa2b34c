// ============= Sample Helpers =============

export function computeRms(samples: Float32Array): number {
  if (samples.length === 0) return 0
  let sum = 0
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i]
  }
  return Math.sqrt(sum / samples.length)
}

/**
 * Drop codec warm-up samples from the head and ramp both edges, so chunks
 * join without clicks. Returns a new array; the input is left untouched.
 */
export function trimAndFade(
  samples: Float32Array,
  trimSamples: number,
  fadeSamples: number
): Float32Array {
  const trimmed = trimSamples > 0 && samples.length > trimSamples
    ? samples.slice(trimSamples)
    : samples.slice()

  const fade = Math.min(fadeSamples, Math.floor(trimmed.length / 4))
  if (fade > 1) {
    for (let i = 0; i < fade; i++) {
      const gain = i / (fade - 1)
      trimmed[i] *= gain
      trimmed[trimmed.length - 1 - i] *= gain
    }
  }
  return trimmed
}

export function resampleLinear(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (fromRate === toRate || samples.length === 0) return samples

  const outLength = Math.max(1, Math.round(samples.length * toRate / fromRate))
  const out = new Float32Array(outLength)
  const step = fromRate / toRate

  for (let i = 0; i < outLength; i++) {
    const pos = i * step
    const left = Math.min(Math.floor(pos), samples.length - 1)
    const right = Math.min(left + 1, samples.length - 1)
    const frac = pos - left
    out[i] = samples[left] + (samples[right] - samples[left]) * frac
  }
  return out
}

// Little-endian signed 16-bit PCM, clipped to [-1, 1]
export function floatToPcm16(samples: Float32Array): Buffer {
  const buffer = Buffer.alloc(samples.length * 2)
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]))
    const value = clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff
    buffer.writeInt16LE(Math.round(value), i * 2)
  }
  return buffer
}
