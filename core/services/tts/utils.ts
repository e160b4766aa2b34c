import path from 'path'
import { createHash } from 'crypto'

// Temp directory name (app-specific to avoid conflicts)
export const TEMP_AUDIO_DIR_NAME = 'audiobook_synth_temp'

export function getTempAudioDir(outputDir: string): string {
  return path.join(outputDir, TEMP_AUDIO_DIR_NAME)
}

/**
 * Serializes async sections. Each caller waits for the previous holder to settle,
 * whether it resolved or rejected.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn)
    this.tail = run.then(() => undefined, () => undefined)
    return run
  }
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  settled: () => boolean
}

export function createDeferred<T>(): Deferred<T> {
  let done = false
  let resolveFn: (value: T) => void = () => undefined
  const promise = new Promise<T>(resolve => {
    resolveFn = resolve
  })
  return {
    promise,
    resolve: (value: T) => {
      if (done) return
      done = true
      resolveFn(value)
    },
    settled: () => done
  }
}

// JSON with sorted object keys, so logically equal values hash the same
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`
  }
  return JSON.stringify(value) ?? 'null'
}

// 31-bit non-negative integer derived from sha256
export function hashToSeed(...parts: unknown[]): number {
  const digest = createHash('sha256').update(stableStringify(parts)).digest()
  return digest.readUInt32BE(0) & 0x7fffffff
}
