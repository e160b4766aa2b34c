import { exec, spawn } from 'child_process'
import type { ChildProcess } from 'child_process'
import { promisify } from 'util'
import http from 'http'
import { z } from 'zod'
import { sleep } from '../../../src/utils'
import type {
  DecodedAudio,
  EngineCapabilities,
  HierarchicalCode,
  InferenceEngine,
  InferencePrompt,
  SamplingParams,
  WaveformCodec
} from './types'

const execAsync = promisify(exec)

// ==================== Wire Schemas ====================

const statusSchema = z.object({
  running: z.boolean().default(true),
  concurrency_safe: z.boolean().default(false),
  supports_state_reset: z.boolean().default(true),
  sample_rate: z.number().int().positive().optional()
})

const generateSchema = z.object({
  token_ids: z.array(z.number().int())
})

export type ServerStatus = z.infer<typeof statusSchema>

// ==================== HTTP Helpers ====================

export interface HttpResponse {
  statusCode: number
  headers: http.IncomingHttpHeaders
  body: Buffer
}

export function httpRequestRaw(
  url: string,
  method: string,
  body?: string,
  timeout: number = 60000
): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const urlObj = new URL(url)
    const options = {
      hostname: urlObj.hostname,
      port: urlObj.port,
      path: urlObj.pathname,
      method,
      headers: body ? {
        'Content-Type': 'application/json',
        'Content-Length': Buffer.byteLength(body)
      } : {}
    }

    const req = http.request(options, (res) => {
      const chunks: Buffer[] = []
      res.on('data', (chunk: Buffer) => chunks.push(chunk))
      res.on('end', () => {
        const buffer = Buffer.concat(chunks)
        const statusCode = res.statusCode ?? 0
        if (statusCode >= 200 && statusCode < 300) {
          resolve({ statusCode, headers: res.headers, body: buffer })
        } else {
          reject(new Error(`HTTP ${statusCode}: ${buffer.toString()}`))
        }
      })
      res.on('error', reject)
    })

    req.on('error', reject)
    req.setTimeout(timeout, () => {
      req.destroy()
      reject(new Error(`Request timeout after ${timeout}ms: ${method} ${urlObj.pathname}`))
    })

    if (body) {
      req.write(body)
    }
    req.end()
  })
}

export async function httpRequest(url: string, method: string, body?: string, timeout?: number): Promise<string> {
  const response = await httpRequestRaw(url, method, body, timeout)
  return response.body.toString('utf-8')
}

async function postJson<T>(url: string, payload: unknown, schema: z.ZodType<T>, timeout: number): Promise<T> {
  const text = await httpRequest(url, 'POST', JSON.stringify(payload), timeout)
  return schema.parse(text ? JSON.parse(text) : {})
}

export async function getServerStatus(baseUrl: string, timeout: number = 5000): Promise<ServerStatus> {
  const text = await httpRequest(`${baseUrl}/status`, 'GET', undefined, timeout)
  return statusSchema.parse(JSON.parse(text))
}

export async function waitForServer(baseUrl: string, maxAttempts: number = 60, delayMs: number = 500): Promise<boolean> {
  let lastError: unknown = null
  for (let i = 0; i < maxAttempts; i++) {
    try {
      const status = await getServerStatus(baseUrl)
      if (status.running) {
        return true
      }
    } catch (error) {
      // Not ready yet
      lastError = error
    }
    await sleep(delayMs)
  }
  if (lastError) {
    console.warn(`[Inference Server] No answer from ${baseUrl}:`, lastError instanceof Error ? lastError.message : lastError)
  }
  return false
}

// Float32 little-endian samples, as the decode route returns them
export function parseFloat32Samples(body: Buffer): Float32Array {
  if (body.length % 4 !== 0) {
    throw new Error(`Decoding error: body of ${body.length} bytes is not float32 aligned`)
  }
  const samples = new Float32Array(body.length / 4)
  for (let i = 0; i < samples.length; i++) {
    samples[i] = body.readFloatLE(i * 4)
  }
  return samples
}

// ==================== Collaborators ====================

export interface HttpClientOptions {
  baseUrl: string
  // Per request; a single generate call can take minutes on CPU
  requestTimeoutMs?: number
}

const DEFAULT_REQUEST_TIMEOUT_MS = 360000

/**
 * Inference engine served by a local HTTP process. Capabilities are read from
 * /status during init.
 */
export class HttpInferenceEngine implements InferenceEngine {
  private readonly baseUrl: string
  private readonly timeout: number
  private caps: EngineCapabilities = { concurrencySafe: false, supportsStateReset: true }

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.timeout = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
  }

  get capabilities(): EngineCapabilities {
    return this.caps
  }

  async init(): Promise<void> {
    const status = await getServerStatus(this.baseUrl)
    if (!status.running) {
      throw new Error(`Server not running at ${this.baseUrl}`)
    }
    this.caps = {
      concurrencySafe: status.concurrency_safe,
      supportsStateReset: status.supports_state_reset
    }
    await httpRequest(`${this.baseUrl}/load`, 'POST', JSON.stringify({ component: 'inference' }), this.timeout)
    console.log(`[Inference Server] Model loaded (concurrency-safe: ${this.caps.concurrencySafe})`)
  }

  async resetState(): Promise<void> {
    await httpRequest(`${this.baseUrl}/reset`, 'POST', '{}', this.timeout)
  }

  async generate(prompt: InferencePrompt, sampling: SamplingParams): Promise<number[]> {
    const response = await postJson(`${this.baseUrl}/generate`, {
      prompt,
      sampling: {
        temperature: sampling.temperature,
        top_p: sampling.topP,
        max_tokens: sampling.maxTokens,
        repetition_penalty: sampling.repetitionPenalty,
        seed: sampling.seed
      }
    }, generateSchema, this.timeout)
    return response.token_ids
  }

  async shutdown(): Promise<void> {
    try {
      await httpRequest(`${this.baseUrl}/unload`, 'POST', JSON.stringify({ component: 'inference' }), this.timeout)
    } catch (error) {
      console.warn('[Inference Server] Unload failed:', error instanceof Error ? error.message : error)
    }
  }
}

export class HttpWaveformCodec implements WaveformCodec {
  private readonly baseUrl: string
  private readonly timeout: number
  private fallbackSampleRate: number

  constructor(options: HttpClientOptions & { sampleRate?: number }) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.timeout = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.fallbackSampleRate = options.sampleRate ?? 24000
  }

  async init(): Promise<void> {
    const status = await getServerStatus(this.baseUrl)
    if (status.sample_rate) {
      this.fallbackSampleRate = status.sample_rate
    }
    await httpRequest(`${this.baseUrl}/load`, 'POST', JSON.stringify({ component: 'waveform' }), this.timeout)
  }

  async decode(codes: HierarchicalCode): Promise<DecodedAudio> {
    const response = await httpRequestRaw(
      `${this.baseUrl}/decode`,
      'POST',
      JSON.stringify({ l1: codes.l1, l2: codes.l2, l3: codes.l3 }),
      this.timeout
    )
    const header = response.headers['x-sample-rate']
    const rate = Number(Array.isArray(header) ? header[0] : header)
    return {
      samples: parseFloat32Samples(response.body),
      sampleRate: Number.isInteger(rate) && rate > 0 ? rate : this.fallbackSampleRate
    }
  }

  async shutdown(): Promise<void> {
    try {
      await httpRequest(`${this.baseUrl}/unload`, 'POST', JSON.stringify({ component: 'waveform' }), this.timeout)
    } catch (error) {
      console.warn('[Inference Server] Unload failed:', error instanceof Error ? error.message : error)
    }
  }
}

// ==================== Server Process ====================

export interface ServerProcessOptions {
  command: string
  args?: string[]
  baseUrl: string
  startupAttempts?: number
  startupDelayMs?: number
}

// Kill process tree on Windows (taskkill /T kills child processes)
async function killProcessTree(pid: number): Promise<void> {
  try {
    if (process.platform === 'win32') {
      await execAsync(`taskkill /pid ${pid} /T /F`)
    } else {
      process.kill(pid, 'SIGKILL')
    }
  } catch (error) {
    // Usually the process is already gone
    console.warn(`[Inference Server] Kill of PID ${pid} failed:`, error instanceof Error ? error.message : error)
  }
}

/**
 * Owns an external inference server process for the lifetime of a job.
 */
export class InferenceServerProcess {
  private readonly options: ServerProcessOptions
  private child: ChildProcess | null = null
  private starting: Promise<void> | null = null

  constructor(options: ServerProcessOptions) {
    this.options = options
  }

  get running(): boolean {
    return this.child !== null
  }

  async start(): Promise<void> {
    if (this.child) {
      console.log('[Inference Server] Already running')
      return
    }
    // Prevent multiple simultaneous starts
    if (this.starting) return this.starting

    this.starting = this.spawnAndWait()
    try {
      await this.starting
    } finally {
      this.starting = null
    }
  }

  private async spawnAndWait(): Promise<void> {
    console.log(`[Inference Server] Starting ${this.options.command}`)

    const child = spawn(this.options.command, this.options.args ?? [], {
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: false
    })
    this.child = child

    child.stdout?.on('data', (data: Buffer) => {
      console.log('[Inference Server]', data.toString().trim())
    })
    child.stderr?.on('data', (data: Buffer) => {
      console.log('[Inference Server]', data.toString().trim())
    })

    const exited = new Promise<Error>(resolve => {
      child.on('error', (error) => {
        console.error('[Inference Server] Process error:', error)
        this.child = null
        resolve(error)
      })
      child.on('close', (code) => {
        console.log(`[Inference Server] Exited with code ${code}`)
        this.child = null
        resolve(new Error(`Inference server exited with code ${code}`))
      })
    })

    const ready = waitForServer(
      this.options.baseUrl,
      this.options.startupAttempts ?? 60,
      this.options.startupDelayMs ?? 500
    )

    const outcome = await Promise.race([ready, exited])
    if (outcome instanceof Error) {
      throw outcome
    }
    if (!outcome) {
      await this.stop()
      throw new Error('Inference server failed to start')
    }
    console.log('[Inference Server] Ready')
  }

  async stop(): Promise<void> {
    const pid = this.child?.pid
    if (!this.child || pid === undefined) return

    console.log(`[Inference Server] Stopping (PID: ${pid})...`)
    try {
      // Try graceful shutdown via HTTP first
      await httpRequest(`${this.options.baseUrl}/shutdown`, 'POST', '{}', 5000)
      await sleep(1000)
    } catch (error) {
      console.warn('[Inference Server] Graceful shutdown failed, killing:', error instanceof Error ? error.message : error)
    }

    if (this.child) {
      await killProcessTree(pid)
    }
    this.child = null
    console.log('[Inference Server] Stopped')
  }
}
