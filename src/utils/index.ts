export function sanitizeFilename(name: string): string {
  return name
    .replace(/[<>:"/\\|?*\x00-\x1F]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .substring(0, 200)
    || 'audiobook'
}

// Stricter than sanitizeFilename: word characters, spaces and hyphens only, joined by underscores
export function sanitizeChapterName(name: string, maxLength: number = 80): string {
  let sanitized = name
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[\s-]+/g, '_')
    .replace(/^_+|_+$/g, '')

  if (sanitized.length > maxLength) {
    // Prefer breaking at an underscore for readability
    const pos = sanitized.slice(0, maxLength).lastIndexOf('_')
    sanitized = sanitized.slice(0, pos > 0 ? pos : maxLength).replace(/_+$/, '')
  }

  return sanitized || 'chapter'
}

export function formatTime(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000)
  const seconds = totalSeconds % 60
  const minutes = Math.floor(totalSeconds / 60) % 60
  const hours = Math.floor(totalSeconds / 3600)
  const pad = (num: number) => String(num).padStart(2, '0')

  if (hours > 0) {
    return `${pad(hours)}h ${pad(minutes)}m ${pad(seconds)}s`
  } else if (minutes > 0) {
    return `${pad(minutes)}m ${pad(seconds)}s`
  } else {
    return `${pad(seconds)}s`
  }
}

// HH:MM:SS for chapter listings
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds))
  const h = Math.floor(total / 3600)
  const m = Math.floor((total % 3600) / 60)
  const s = total % 60
  const pad = (num: number) => String(num).padStart(2, '0')
  return `${pad(h)}:${pad(m)}:${pad(s)}`
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

export function textPreview(text: string, maxLength: number = 60): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  if (flat.length <= maxLength) return flat
  return flat.slice(0, maxLength - 3).trimEnd() + '...'
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
