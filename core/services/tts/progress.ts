import { formatTime } from '../../../src/utils'

export interface ProgressSnapshot {
  completed: number
  total: number
  percent: number
  etaMs: number | null
  status: string
  preview: string
}

export interface ProgressTrackerOptions {
  now?: () => number
  // Recent delivery intervals averaged for the ETA
  window?: number
  // Deliveries needed before an ETA is shown
  minSamples?: number
}

/**
 * Turns delivery-order progress callbacks into a percent, ETA and status line.
 */
export class ProgressTracker {
  private readonly total: number
  private readonly now: () => number
  private readonly window: number
  private readonly minSamples: number
  private readonly intervals: number[] = []
  private lastTime: number

  constructor(total: number, options: ProgressTrackerOptions = {}) {
    this.total = total
    this.now = options.now ?? Date.now
    this.window = options.window ?? 10
    this.minSamples = options.minSamples ?? 3
    this.lastTime = this.now()
  }

  update(completed: number, preview: string = ''): ProgressSnapshot {
    const time = this.now()
    this.intervals.push(time - this.lastTime)
    this.lastTime = time

    const percent = this.total > 0 ? Math.round((completed / this.total) * 100) : 100
    const remaining = Math.max(0, this.total - completed)

    let etaMs: number | null = null
    let status: string
    if (completed >= this.minSamples) {
      const recent = this.intervals.slice(-this.window)
      const avg = recent.reduce((a, b) => a + b, 0) / recent.length
      etaMs = remaining * avg
      status = `~${formatTime(etaMs)} remaining | Segment ${completed} of ${this.total}`
    } else {
      status = `Calculating time... | Segment ${completed} of ${this.total}`
    }

    return { completed, total: this.total, percent, etaMs, status, preview }
  }
}
