import fs from 'fs'
import path from 'path'
import type { FileHandle } from 'fs/promises'
import { exec } from 'child_process'
import { promisify } from 'util'
import { formatFileSize, sanitizeChapterName, sanitizeFilename } from '../../../src/utils'
import { floatToPcm16 } from './audio'
import { cleanupTempAudio, setLastOutputDir } from './cleanup'
import { getTempAudioDir } from './utils'
import type { AudioExporter, ChapterTimeline, ExportOutput } from './types'

const execAsync = promisify(exec)

const WAV_HEADER_BYTES = 44
// Largest data chunk the 32-bit RIFF size field can describe, in whole samples
export const MAX_WAV_DATA_BYTES = Math.floor((0xffffffff - 36) / 2) * 2
// Key of the single book-wide file when chapters are not split
const BOOK_FILE = -1

export type OutputFormat = 'wav' | 'm4b'

export interface WavExporterOptions {
  outputDir: string
  bookTitle: string
  format?: OutputFormat
  splitChapters?: boolean
  ffmpegPath?: string
  // Data bytes per WAV file before output rolls over to a new part
  maxDataBytes?: number
  // Runs the ffmpeg command line; defaults to child_process.exec
  runCommand?: (command: string) => Promise<unknown>
}

interface WavPart {
  filePath: string
  handle: FileHandle
  sampleRate: number
  dataBytes: number
  // Offset of the part's first sample within its book or chapter stream
  startSample: number
  closed: boolean
}

function partName(name: string, index: number, count: number): string {
  return count > 1 ? `${name}_part${index + 1}` : name
}

// ============= WAV Header =============

export function buildWavHeader(dataBytes: number, sampleRate: number, channels: number = 1): Buffer {
  const bitsPerSample = 16
  const blockAlign = channels * bitsPerSample / 8
  const header = Buffer.alloc(WAV_HEADER_BYTES)

  header.write('RIFF', 0, 'ascii')
  header.writeUInt32LE(36 + dataBytes, 4)
  header.write('WAVE', 8, 'ascii')
  header.write('fmt ', 12, 'ascii')
  header.writeUInt32LE(16, 16)
  header.writeUInt16LE(1, 20) // PCM
  header.writeUInt16LE(channels, 22)
  header.writeUInt32LE(sampleRate, 24)
  header.writeUInt32LE(sampleRate * blockAlign, 28)
  header.writeUInt16LE(blockAlign, 32)
  header.writeUInt16LE(bitsPerSample, 34)
  header.write('data', 36, 'ascii')
  header.writeUInt32LE(dataBytes, 40)

  return header
}

// ============= Chapter Metadata =============

function escapeMetadata(value: string): string {
  return value.replace(/[=;#\\\n]/g, ch => `\\${ch}`)
}

/**
 * FFMETADATA1 document with one [CHAPTER] per timeline, millisecond timebase
 */
export function formatChapterMetadata(bookTitle: string, timelines: readonly ChapterTimeline[]): string {
  const lines = [';FFMETADATA1', `title=${escapeMetadata(bookTitle)}`]

  for (const timeline of timelines) {
    lines.push(
      '',
      '[CHAPTER]',
      'TIMEBASE=1/1000',
      `START=${Math.round(timeline.startS * 1000)}`,
      `END=${Math.round(timeline.endS * 1000)}`,
      `title=${escapeMetadata(timeline.title)}`
    )
  }

  return lines.join('\n') + '\n'
}

// ============= Exporter =============

/**
 * Streams 16-bit mono PCM into WAV files under the temp directory, then moves
 * (or remuxes to m4b) the finished files into the output directory. A stream
 * that outgrows one WAV continues in numbered part files.
 */
export class WavFileExporter implements AudioExporter {
  private readonly options: Required<Omit<WavExporterOptions, 'runCommand'>>
  private readonly runCommand: (command: string) => Promise<unknown>
  private readonly tempDir: string
  private readonly files = new Map<number, WavPart[]>()
  private finalized = false
  private aborted = false

  constructor(options: WavExporterOptions) {
    const maxDataBytes = Math.min(options.maxDataBytes ?? MAX_WAV_DATA_BYTES, MAX_WAV_DATA_BYTES)
    this.options = {
      outputDir: options.outputDir,
      bookTitle: options.bookTitle,
      format: options.format ?? 'wav',
      splitChapters: options.splitChapters ?? false,
      ffmpegPath: options.ffmpegPath ?? 'ffmpeg',
      maxDataBytes: Math.max(2, Math.floor(maxDataBytes / 2) * 2)
    }
    this.runCommand = options.runCommand ?? (command => execAsync(command, { maxBuffer: 1024 * 1024 * 100 }))
    this.tempDir = getTempAudioDir(options.outputDir)
  }

  async write(chapterId: number, samples: Float32Array, sampleRate: number): Promise<void> {
    if (this.finalized) {
      throw new Error('Exporter already finalized')
    }
    if (samples.length === 0) return

    const key = this.options.splitChapters ? chapterId : BOOK_FILE
    const parts = this.files.get(key) ?? []
    if (parts.length > 0 && parts[0].sampleRate !== sampleRate) {
      throw new Error(`Sample rate changed mid-file: ${parts[0].sampleRate} -> ${sampleRate}`)
    }

    const pcm = floatToPcm16(samples)
    let offset = 0
    while (offset < pcm.length) {
      const part = await this.partWithRoom(key, sampleRate)
      const length = Math.min(pcm.length - offset, this.options.maxDataBytes - part.dataBytes)
      await part.handle.write(pcm, offset, length, WAV_HEADER_BYTES + part.dataBytes)
      part.dataBytes += length
      offset += length
    }
  }

  async finalize(timelines: ChapterTimeline[], totalDurationS: number): Promise<ExportOutput> {
    if (this.finalized) {
      throw new Error('Exporter already finalized')
    }
    this.finalized = true

    for (const parts of this.files.values()) {
      for (const part of parts) {
        await this.closePart(part)
      }
    }

    await fs.promises.mkdir(this.options.outputDir, { recursive: true })
    const baseName = sanitizeFilename(this.options.bookTitle)
    const outputs: string[] = []

    try {
      if (this.options.splitChapters) {
        for (const [index, timeline] of timelines.entries()) {
          const parts = this.files.get(timeline.chapterId)
          if (!parts) continue
          const name = `${String(index + 1).padStart(2, '0')}_${sanitizeChapterName(timeline.title)}`
          outputs.push(...await this.publishParts(parts, name, [timeline], timeline.startS))
        }
      } else {
        const parts = this.files.get(BOOK_FILE)
        if (parts) {
          outputs.push(...await this.publishParts(parts, baseName, timelines, 0))
        }
      }

      if (this.options.format === 'wav' && timelines.length > 0) {
        const chaptersPath = path.join(this.options.outputDir, `${baseName}.chapters.txt`)
        await fs.promises.writeFile(chaptersPath, formatChapterMetadata(this.options.bookTitle, timelines), 'utf-8')
        outputs.push(chaptersPath)
      }
    } finally {
      await cleanupTempAudio(this.options.outputDir)
    }

    let totalBytes = 0
    for (const output of outputs) {
      totalBytes += (await fs.promises.stat(output)).size
    }
    console.log(
      `[Exporter] Wrote ${outputs.length} file(s), ${formatFileSize(totalBytes)}, ` +
      `${totalDurationS.toFixed(1)}s of audio`
    )
    return { outputs }
  }

  async abort(): Promise<void> {
    if (this.aborted) return
    this.aborted = true
    this.finalized = true

    for (const parts of this.files.values()) {
      for (const part of parts) {
        if (part.closed) continue
        part.closed = true
        try {
          await part.handle.close()
        } catch (error) {
          console.warn(`[Exporter] Failed to close ${part.filePath}:`, error)
        }
      }
    }

    await cleanupTempAudio(this.options.outputDir)
    console.warn(`[Exporter] Aborted "${this.options.bookTitle}", partial audio removed`)
  }

  private async partWithRoom(key: number, sampleRate: number): Promise<WavPart> {
    const parts = this.files.get(key) ?? []
    const last = parts.length > 0 ? parts[parts.length - 1] : null
    if (last && last.dataBytes < this.options.maxDataBytes) return last

    let startSample = 0
    if (last) {
      await this.closePart(last)
      startSample = last.startSample + last.dataBytes / 2
      console.log(`[Exporter] ${path.basename(last.filePath)} is full, starting part ${parts.length + 1}`)
    }

    await fs.promises.mkdir(this.tempDir, { recursive: true })
    setLastOutputDir(this.options.outputDir)

    const name = key === BOOK_FILE ? 'book' : `chapter_${key}`
    const filePath = path.join(this.tempDir, `${name}${parts.length > 0 ? `_part${parts.length + 1}` : ''}.wav`)
    const handle = await fs.promises.open(filePath, 'w+')
    const part: WavPart = { filePath, handle, sampleRate, dataBytes: 0, startSample, closed: false }
    parts.push(part)
    this.files.set(key, parts)

    const placeholder = buildWavHeader(0, sampleRate)
    await handle.write(placeholder, 0, placeholder.length, 0)
    return part
  }

  private async closePart(part: WavPart): Promise<void> {
    if (part.closed) return
    const header = buildWavHeader(part.dataBytes, part.sampleRate)
    await part.handle.write(header, 0, header.length, 0)
    await part.handle.close()
    part.closed = true
  }

  private async publishParts(
    parts: readonly WavPart[],
    name: string,
    timelines: readonly ChapterTimeline[],
    baseS: number
  ): Promise<string[]> {
    const outputs: string[] = []
    for (const [index, part] of parts.entries()) {
      const startS = baseS + part.startSample / part.sampleRate
      const endS = startS + part.dataBytes / 2 / part.sampleRate
      // Chapter marks relative to this part, clipped to its range when split
      const local = parts.length > 1
        ? timelines
          .filter(timeline => timeline.endS > startS && timeline.startS < endS)
          .map(timeline => ({
            ...timeline,
            startS: Math.max(timeline.startS, startS) - startS,
            endS: Math.min(timeline.endS, endS) - startS
          }))
        : timelines.map(timeline => ({ ...timeline, startS: timeline.startS - startS, endS: timeline.endS - startS }))
      outputs.push(await this.publish(part.filePath, partName(name, index, parts.length), local))
    }
    return outputs
  }

  private async publish(wavPath: string, name: string, timelines: readonly ChapterTimeline[]): Promise<string> {
    if (this.options.format === 'wav') {
      const target = path.join(this.options.outputDir, `${name}.wav`)
      await fs.promises.copyFile(wavPath, target)
      return target
    }

    const target = path.join(this.options.outputDir, `${name}.m4b`)
    const metadataPath = path.join(this.tempDir, `${name}.ffmetadata`)
    await fs.promises.writeFile(metadataPath, formatChapterMetadata(this.options.bookTitle, timelines), 'utf-8')

    const command = `"${this.options.ffmpegPath}" -y -i "${wavPath}" -i "${metadataPath}" ` +
      `-map 0:a -map_metadata 1 -map_chapters 1 -c:a aac -b:a 64k "${target}"`
    console.log(`[Exporter] Remuxing ${path.basename(target)}`)
    await this.runCommand(command)
    return target
  }
}
