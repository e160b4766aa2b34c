import fs from 'fs'
import path from 'path'
import { sleep } from '../../../src/utils'
import { getTempAudioDir } from './utils'

// Track last used output directory for cleanup
let lastOutputDir: string | null = null

export function setLastOutputDir(dir: string | null): void {
  lastOutputDir = dir
}

// Cleanup temp audio directory with retry logic for locked files
export async function cleanupTempAudio(outputDir?: string): Promise<void> {
  const dirsToClean: string[] = []

  if (outputDir) {
    dirsToClean.push(getTempAudioDir(outputDir))
  }

  if (lastOutputDir && lastOutputDir !== outputDir) {
    dirsToClean.push(getTempAudioDir(lastOutputDir))
  }

  for (const tempDir of dirsToClean) {
    await cleanupDirWithRetry(tempDir)
  }
}

async function cleanupDirWithRetry(dirPath: string, maxRetries: number = 3): Promise<void> {
  if (!fs.existsSync(dirPath)) return

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      for (const file of await fs.promises.readdir(dirPath)) {
        await fs.promises.rm(path.join(dirPath, file), { force: true, recursive: true })
      }
      await fs.promises.rm(dirPath, { recursive: true, force: true })
      console.log(`[Cleanup] Removed temp directory: ${dirPath}`)
      return
    } catch (error) {
      if (attempt === maxRetries) {
        console.warn(`[Cleanup] Failed to remove ${dirPath} after ${maxRetries} attempts:`, error)
      } else {
        await sleep(100)
      }
    }
  }
}
