import { TOKENS_PER_FRAME } from '../../../src/constants'
import type { HierarchicalCode, UnpackResult } from './types'

/*
 * Frame layout, 7 tokens per frame i:
 *   slot0 -> L1[i]
 *   slot1 -> L2[2i]     slot4 -> L2[2i+1]
 *   slot2 -> L3[4i]     slot3 -> L3[4i+1]
 *   slot5 -> L3[4i+2]   slot6 -> L3[4i+3]
 */

function assertCodecArgs(base: number, alphabetSize: number): void {
  if (!Number.isInteger(base) || base < 0) {
    throw new Error(`Invalid codec base: ${base}`)
  }
  if (!Number.isInteger(alphabetSize) || alphabetSize <= 0) {
    throw new Error(`Invalid codec alphabet size: ${alphabetSize}`)
  }
}

/**
 * Keep only the audio portion of a generated stream: everything after the first
 * code-start marker and before the first code-end marker. Either marker may be absent.
 */
export function sliceAudioSpan(
  tokens: readonly number[],
  markers: { codeStartId?: number; codeEndId?: number }
): number[] {
  let start = 0
  if (markers.codeStartId !== undefined) {
    const startIdx = tokens.indexOf(markers.codeStartId)
    if (startIdx !== -1) start = startIdx + 1
  }

  let end = tokens.length
  if (markers.codeEndId !== undefined) {
    const endIdx = tokens.indexOf(markers.codeEndId, start)
    if (endIdx !== -1) end = endIdx
  }

  return tokens.slice(start, end)
}

/**
 * Unpack a flat token stream into three-level hierarchical codes.
 * Out-of-range tokens are skipped and counted; a trailing partial frame is dropped.
 */
export function unpackFrames(
  tokens: readonly number[],
  base: number,
  alphabetSize: number
): UnpackResult {
  assertCodecArgs(base, alphabetSize)

  const upper = base + TOKENS_PER_FRAME * alphabetSize - 1
  const valid: number[] = []
  let anomalies = 0

  for (const token of tokens) {
    if (Number.isInteger(token) && token >= base && token <= upper) {
      valid.push((token - base) % alphabetSize)
    } else {
      anomalies++
    }
  }

  const frames = Math.floor(valid.length / TOKENS_PER_FRAME)
  const l1 = new Array<number>(frames)
  const l2 = new Array<number>(frames * 2)
  const l3 = new Array<number>(frames * 4)

  for (let i = 0; i < frames; i++) {
    const s = i * TOKENS_PER_FRAME
    l1[i] = valid[s]
    l2[2 * i] = valid[s + 1]
    l3[4 * i] = valid[s + 2]
    l3[4 * i + 1] = valid[s + 3]
    l2[2 * i + 1] = valid[s + 4]
    l3[4 * i + 2] = valid[s + 5]
    l3[4 * i + 3] = valid[s + 6]
  }

  return {
    codes: { l1, l2, l3 },
    frames,
    anomalies,
    discarded: valid.length - frames * TOKENS_PER_FRAME
  }
}

/**
 * Inverse of unpackFrames. Slot k carries an offset of k * alphabetSize, matching
 * the token ranges the model emits per slot.
 */
export function packFrames(
  codes: HierarchicalCode,
  base: number,
  alphabetSize: number
): number[] {
  assertCodecArgs(base, alphabetSize)

  const frames = codes.l1.length
  if (codes.l2.length !== frames * 2 || codes.l3.length !== frames * 4) {
    throw new Error(
      `Mismatched code lengths: L1=${frames}, L2=${codes.l2.length}, L3=${codes.l3.length}`
    )
  }

  const check = (value: number): number => {
    if (!Number.isInteger(value) || value < 0 || value >= alphabetSize) {
      throw new Error(`Code value out of range: ${value}`)
    }
    return value
  }

  const tokens: number[] = []
  for (let i = 0; i < frames; i++) {
    const slots = [
      codes.l1[i],
      codes.l2[2 * i],
      codes.l3[4 * i],
      codes.l3[4 * i + 1],
      codes.l2[2 * i + 1],
      codes.l3[4 * i + 2],
      codes.l3[4 * i + 3]
    ]
    slots.forEach((code, slot) => {
      tokens.push(base + slot * alphabetSize + check(code))
    })
  }
  return tokens
}
