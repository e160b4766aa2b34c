import { describe, it, expect, vi, beforeEach } from 'vitest'
import { ChapterAssembler } from '../core/services/tts/assembler'
import type { SynthesisResult } from '../core/services/tts/types'
import { FakeExporter, makeResult } from './helpers/fakes'

const TITLES = new Map([[0, 'Opening'], [1, 'Closing']])

function samples(length: number, value: number = 0.5): Float32Array {
  return new Float32Array(length).fill(value)
}

async function* stream(results: SynthesisResult[]): AsyncGenerator<SynthesisResult> {
  for (const result of results) {
    yield result
  }
}

describe('ChapterAssembler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  it('builds contiguous chapter timelines with chunk and chapter gaps', async () => {
    const exporter = new FakeExporter()
    const assembler = new ChapterAssembler(exporter, TITLES, { chunkGapS: 0.25, chapterGapS: 2.0 })

    const result = await assembler.consume(stream([
      makeResult({ globalIndex: 0, chapterId: 0, chunkIndex: 0, samples: samples(500) }),
      makeResult({ globalIndex: 1, chapterId: 0, chunkIndex: 1, samples: samples(300) }),
      makeResult({ globalIndex: 2, chapterId: 1, chunkIndex: 0, samples: samples(200) })
    ]))

    const [first, second] = result.timelines
    expect(first.title).toBe('Opening')
    expect(first.segments).toEqual([
      { chunkIndex: 0, startS: 0, endS: 0.5 },
      { chunkIndex: 1, startS: 0.75, endS: 1.05 }
    ])
    expect(first.startS).toBe(0)
    expect(first.endS).toBe(3.05)
    expect(second.title).toBe('Closing')
    expect(second.startS).toBe(first.endS)
    expect(second.segments).toEqual([{ chunkIndex: 0, startS: 3.05, endS: 3.25 }])
    expect(second.totalDurationS).toBeCloseTo(0.2)
    expect(result.totalDurationS).toBe(3.25)
    expect(result.outputs).toEqual(['book.wav'])
  })

  it('writes chunks and silence to the exporter in order', async () => {
    const exporter = new FakeExporter()
    const assembler = new ChapterAssembler(exporter, TITLES, { chunkGapS: 0.25, chapterGapS: 2.0 })

    await assembler.consume(stream([
      makeResult({ globalIndex: 0, chapterId: 0, samples: samples(500) }),
      makeResult({ globalIndex: 1, chapterId: 0, samples: samples(300) }),
      makeResult({ globalIndex: 2, chapterId: 1, samples: samples(200) })
    ]))

    expect(exporter.writes.map(w => [w.chapterId, w.length, w.first])).toEqual([
      [0, 500, 0.5],
      [0, 250, 0],
      [0, 300, 0.5],
      [0, 2000, 0],
      [1, 200, 0.5]
    ])
    expect(exporter.finalized?.totalDurationS).toBe(3.25)
    expect(exporter.finalized?.timelines).toHaveLength(2)
  })

  it('total duration equals chunk durations plus every gap', async () => {
    const exporter = new FakeExporter()
    const assembler = new ChapterAssembler(exporter, TITLES, { chunkGapS: 0.1, chapterGapS: 1 })
    const lengths = [120, 80, 400, 60]

    const result = await assembler.consume(stream(lengths.map((length, i) => makeResult({
      globalIndex: i,
      chapterId: i < 2 ? 0 : 1,
      samples: samples(length)
    }))))

    // Two chunk gaps (one per chapter) and one chapter gap
    expect(result.totalDurationS).toBeCloseTo((120 + 80 + 400 + 60) / 1000 + 2 * 0.1 + 1, 10)
    expect(result.timelines[0].endS).toBe(result.timelines[1].startS)
  })

  it('still writes degraded chunks and reports their global index', async () => {
    const exporter = new FakeExporter()
    const onDegradedChunk = vi.fn()
    const assembler = new ChapterAssembler(exporter, TITLES, { chunkGapS: 0, onDegradedChunk })

    const result = await assembler.consume(stream([
      makeResult({ globalIndex: 0, samples: samples(100) }),
      makeResult({ globalIndex: 1, samples: samples(100, 0.0001), qualityOk: false, attemptsUsed: 3 }),
      makeResult({ globalIndex: 2, samples: new Float32Array(0), qualityOk: false, engineError: 'Request timeout' })
    ]))

    expect(result.failedChunkIndices).toEqual([1, 2])
    expect(onDegradedChunk.mock.calls.map(([r]) => r.globalIndex)).toEqual([1, 2])
    expect(exporter.samplesFor(0)).toBe(200)
    expect(result.timelines[0].segments[2]).toEqual({ chunkIndex: 2, startS: 0.2, endS: 0.2 })
  })

  it('resamples results that arrive at a different rate', async () => {
    const exporter = new FakeExporter()
    const assembler = new ChapterAssembler(exporter, TITLES, { sampleRate: 1000, chunkGapS: 0 })

    await assembler.append(makeResult({ globalIndex: 0, samples: samples(400), sampleRate: 2000 }))
    const result = await assembler.finish()

    expect(exporter.writes).toEqual([{ chapterId: 0, length: 200, sampleRate: 1000, first: 0.5 }])
    expect(result.totalDurationS).toBe(0.2)
  })

  it('takes the output rate from the first result with audio', async () => {
    const exporter = new FakeExporter()
    const assembler = new ChapterAssembler(exporter, TITLES, { chunkGapS: 0 })

    await assembler.append(makeResult({ globalIndex: 0, samples: new Float32Array(0), sampleRate: 24000, qualityOk: false }))
    await assembler.append(makeResult({ globalIndex: 1, samples: samples(300), sampleRate: 1000 }))
    const result = await assembler.finish()

    expect(exporter.writes).toEqual([{ chapterId: 0, length: 300, sampleRate: 1000, first: 0.5 }])
    expect(result.totalDurationS).toBe(0.3)
  })

  it('keeps chunk gaps between failed chunks that open the book', async () => {
    const exporter = new FakeExporter()
    const assembler = new ChapterAssembler(exporter, TITLES, { chunkGapS: 0.25 })

    const result = await assembler.consume(stream([
      makeResult({ globalIndex: 0, samples: new Float32Array(0), qualityOk: false }),
      makeResult({ globalIndex: 1, samples: new Float32Array(0), qualityOk: false }),
      makeResult({ globalIndex: 2, samples: samples(300) })
    ]))

    expect(result.timelines[0].segments).toEqual([
      { chunkIndex: 0, startS: 0, endS: 0 },
      { chunkIndex: 1, startS: 0.25, endS: 0.25 },
      { chunkIndex: 2, startS: 0.5, endS: 0.8 }
    ])
    expect(result.totalDurationS).toBe(0.8)
    expect(exporter.writes.map(w => [w.length, w.first])).toEqual([[250, 0], [250, 0], [300, 0.5]])
  })

  it('keeps the chapter gap after a chapter with no audio', async () => {
    const exporter = new FakeExporter()
    const assembler = new ChapterAssembler(exporter, TITLES, { chunkGapS: 0.25, chapterGapS: 1 })

    const result = await assembler.consume(stream([
      makeResult({ globalIndex: 0, chapterId: 0, samples: new Float32Array(0), qualityOk: false }),
      makeResult({ globalIndex: 1, chapterId: 1, chunkIndex: 0, samples: new Float32Array(0), qualityOk: false }),
      makeResult({ globalIndex: 2, chapterId: 1, chunkIndex: 1, samples: samples(100) })
    ]))

    expect(result.timelines.map(t => [t.startS, t.endS])).toEqual([[0, 1], [1, 1.35]])
    expect(result.timelines[1].segments).toEqual([
      { chunkIndex: 0, startS: 1, endS: 1 },
      { chunkIndex: 1, startS: 1.25, endS: 1.35 }
    ])
    expect(exporter.samplesFor(0)).toBe(1000)
    expect(exporter.samplesFor(1)).toBe(350)
    expect(result.totalDurationS).toBe(1.35)
  })

  it('writes the gaps of a book with no audio at the fallback rate', async () => {
    const exporter = new FakeExporter()
    const assembler = new ChapterAssembler(exporter, TITLES, { chunkGapS: 0.25 })

    const result = await assembler.consume(stream([
      makeResult({ globalIndex: 0, samples: new Float32Array(0), qualityOk: false, sampleRate: 2000 }),
      makeResult({ globalIndex: 1, samples: new Float32Array(0), qualityOk: false, sampleRate: 2000 })
    ]))

    expect(exporter.writes).toEqual([{ chapterId: 0, length: 500, sampleRate: 2000, first: 0 }])
    expect(result.totalDurationS).toBe(0.25)
  })

  it('aborts the exporter when a write fails', async () => {
    const exporter = new FakeExporter({ failOnWrite: 2 })
    const assembler = new ChapterAssembler(exporter, TITLES, { chunkGapS: 0 })

    await expect(assembler.consume(stream([
      makeResult({ globalIndex: 0 }),
      makeResult({ globalIndex: 1 })
    ]))).rejects.toThrow('ENOSPC: no space left on device')

    expect(exporter.aborted).toBe(true)
    expect(exporter.finalized).toBeNull()
    await expect(assembler.finish()).rejects.toThrow('Assembler already finished')
  })

  it('names chapters without a title by position', async () => {
    const assembler = new ChapterAssembler(new FakeExporter(), new Map())

    await assembler.append(makeResult({ globalIndex: 0, chapterId: 4 }))
    const result = await assembler.finish()

    expect(result.timelines[0].title).toBe('Chapter 5')
  })

  it('rejects out-of-order results', async () => {
    const assembler = new ChapterAssembler(new FakeExporter(), TITLES)

    await assembler.append(makeResult({ globalIndex: 3 }))

    await expect(assembler.append(makeResult({ globalIndex: 2 }))).rejects.toThrow('Out-of-order result: 2 after 3')
  })

  it('finalizes an empty book', async () => {
    const exporter = new FakeExporter()
    const result = await new ChapterAssembler(exporter, TITLES).finish()

    expect(result.timelines).toEqual([])
    expect(result.totalDurationS).toBe(0)
    expect(exporter.finalized).toEqual({ timelines: [], totalDurationS: 0 })
  })
})
