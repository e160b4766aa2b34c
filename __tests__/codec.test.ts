import { describe, it, expect } from 'vitest'
import { packFrames, sliceAudioSpan, unpackFrames } from '../core/services/tts/codec'

const BASE = 1000
const ALPHABET = 16

describe('unpackFrames', () => {
  it('maps the seven slots of a frame onto the three levels', () => {
    const tokens = [1, 2, 3, 4, 5, 6, 7].map((code, slot) => BASE + slot * ALPHABET + code)

    const result = unpackFrames(tokens, BASE, ALPHABET)

    expect(result.frames).toBe(1)
    expect(result.codes).toEqual({ l1: [1], l2: [2, 5], l3: [3, 4, 6, 7] })
    expect(result.anomalies).toBe(0)
    expect(result.discarded).toBe(0)
  })

  it('inverts packFrames', () => {
    const codes = {
      l1: [0, 15, 7],
      l2: [1, 2, 3, 4, 5, 6],
      l3: [8, 9, 10, 11, 12, 13, 14, 15, 0, 1, 2, 3]
    }

    const tokens = packFrames(codes, BASE, ALPHABET)
    const result = unpackFrames(tokens, BASE, ALPHABET)

    expect(tokens).toHaveLength(21)
    expect(result.codes).toEqual(codes)
    expect(result.frames).toBe(3)
  })

  it('drops a trailing partial frame', () => {
    const tokens = Array.from({ length: 10 }, (_, i) => BASE + i)

    const result = unpackFrames(tokens, BASE, ALPHABET)

    expect(result.frames).toBe(1)
    expect(result.discarded).toBe(3)
    expect(result.codes.l1).toEqual([0])
  })

  it('skips and counts out-of-range tokens', () => {
    const frame = [0, 1, 2, 3, 4, 5, 6].map(slot => BASE + slot * ALPHABET)
    const tokens = [BASE - 1, ...frame.slice(0, 3), BASE + 7 * ALPHABET, 1000.5, ...frame.slice(3)]

    const result = unpackFrames(tokens, BASE, ALPHABET)

    expect(result.anomalies).toBe(3)
    expect(result.frames).toBe(1)
    expect(result.codes).toEqual({ l1: [0], l2: [0, 0], l3: [0, 0, 0, 0] })
  })

  it('yields empty codes when every token is below base', () => {
    const result = unpackFrames([1, 2, 3, 4, 5, 6, 7, 8], BASE, ALPHABET)

    expect(result.codes).toEqual({ l1: [], l2: [], l3: [] })
    expect(result.frames).toBe(0)
    expect(result.anomalies).toBe(8)
  })

  it('rejects invalid codec arguments', () => {
    expect(() => unpackFrames([], -1, ALPHABET)).toThrow('Invalid codec base: -1')
    expect(() => unpackFrames([], BASE, 0)).toThrow('Invalid codec alphabet size: 0')
  })
})

describe('packFrames', () => {
  it('rejects mismatched level lengths', () => {
    expect(() => packFrames({ l1: [1], l2: [1], l3: [1, 2, 3, 4] }, BASE, ALPHABET))
      .toThrow('Mismatched code lengths: L1=1, L2=1, L3=4')
  })

  it('rejects codes outside the alphabet', () => {
    expect(() => packFrames({ l1: [16], l2: [0, 0], l3: [0, 0, 0, 0] }, BASE, ALPHABET))
      .toThrow('Code value out of range: 16')
  })
})

describe('sliceAudioSpan', () => {
  it('keeps tokens between the start and end markers', () => {
    expect(sliceAudioSpan([5, 90, 1, 2, 91, 9], { codeStartId: 90, codeEndId: 91 })).toEqual([1, 2])
  })

  it('keeps everything when markers are absent', () => {
    expect(sliceAudioSpan([1, 2, 3], { codeStartId: 90, codeEndId: 91 })).toEqual([1, 2, 3])
    expect(sliceAudioSpan([1, 2, 3], {})).toEqual([1, 2, 3])
  })

  it('only looks for the end marker after the start marker', () => {
    expect(sliceAudioSpan([91, 90, 4, 91], { codeStartId: 90, codeEndId: 91 })).toEqual([4])
  })
})
