import type { TextChunk } from './types'

// ============= Text Processing =============

// Inline annotation markers: <laugh>, </whisper>, <emphasis level="strong">, [sighs]
const MARKER_PATTERN = /<\/?[A-Za-z][^<>\n]*>|\[[^[\]\n]+\]/y
const SENTENCE_END_PATTERN = /[.!?…。！？]+["'”’»)\]]*$/
const CLAUSE_END_PATTERN = /(?:[,;:]["'”’»)\]]*|[—–])$/
const PARAGRAPH_BREAK_PATTERN = /\n[^\S\n]*\n/
const WHITESPACE_PATTERN = /\s/

/**
 * Clean text before chunking. Annotation markers pass through untouched.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/\r\n?/g, '\n')
    .replace(/[“”«»„]/g, '"')
    .replace(/[‘’‚]/g, "'")
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
}

// A whitespace-delimited run of text. Markers containing spaces stay inside one atom.
interface Atom {
  start: number
  end: number
  words: number
  markerChars: number
  sentenceEnd: boolean
  clauseEnd: boolean
}

// Inclusive range of atom indices
type Span = [number, number]

function scanAtoms(text: string): Atom[] {
  const atoms: Atom[] = []
  let pos = 0

  while (pos < text.length) {
    if (WHITESPACE_PATTERN.test(text[pos])) {
      pos++
      continue
    }

    const start = pos
    let markerChars = 0
    let bare = ''

    while (pos < text.length && !WHITESPACE_PATTERN.test(text[pos])) {
      MARKER_PATTERN.lastIndex = pos
      const marker = MARKER_PATTERN.exec(text)
      if (marker) {
        markerChars += marker[0].length
        pos += marker[0].length
        continue
      }
      bare += text[pos]
      pos++
    }

    atoms.push({
      start,
      end: pos,
      words: bare.length > 0 ? 1 : 0,
      markerChars,
      sentenceEnd: SENTENCE_END_PATTERN.test(bare),
      clauseEnd: CLAUSE_END_PATTERN.test(bare)
    })
  }

  // A blank line closes a sentence even without punctuation (headings, list items)
  for (let i = 0; i < atoms.length - 1; i++) {
    if (PARAGRAPH_BREAK_PATTERN.test(text.slice(atoms[i].end, atoms[i + 1].start))) {
      atoms[i].sentenceEnd = true
    }
  }

  return atoms
}

function splitAt(span: Span, atoms: Atom[], isBoundary: (atom: Atom) => boolean): Span[] {
  const parts: Span[] = []
  let start = span[0]
  for (let i = span[0]; i <= span[1]; i++) {
    if (i === span[1] || isBoundary(atoms[i])) {
      parts.push([start, i])
      start = i + 1
    }
  }
  return parts
}

/**
 * Split text into chunks bounded by both a word budget and a character budget.
 * Sentences are kept whole where they fit; oversized ones are broken at clause
 * boundaries, then at word boundaries. A single lexeme longer than maxChars is
 * emitted alone rather than cut.
 */
export function chunkText(
  text: string,
  maxWords: number,
  maxChars: number,
  chapterId: number = 0
): TextChunk[] {
  const atoms = scanAtoms(text)
  if (atoms.length === 0) return []

  const wordPrefix = [0]
  const markerPrefix = [0]
  for (const atom of atoms) {
    wordPrefix.push(wordPrefix[wordPrefix.length - 1] + atom.words)
    markerPrefix.push(markerPrefix[markerPrefix.length - 1] + atom.markerChars)
  }

  const wordsIn = (a: number, b: number) => wordPrefix[b + 1] - wordPrefix[a]
  const charsIn = (a: number, b: number) =>
    atoms[b].end - atoms[a].start - (markerPrefix[b + 1] - markerPrefix[a])
  const fits = (a: number, b: number) => wordsIn(a, b) <= maxWords && charsIn(a, b) <= maxChars

  const hardSplit = (span: Span): Span[] => {
    const parts: Span[] = []
    let start = span[0]
    for (let i = span[0] + 1; i <= span[1]; i++) {
      if (!fits(start, i)) {
        parts.push([start, i - 1])
        start = i
      }
    }
    parts.push([start, span[1]])
    return parts
  }

  const pieces: Span[] = []
  for (const sentence of splitAt([0, atoms.length - 1], atoms, atom => atom.sentenceEnd)) {
    if (fits(sentence[0], sentence[1])) {
      pieces.push(sentence)
      continue
    }
    for (const clause of splitAt(sentence, atoms, atom => atom.clauseEnd)) {
      if (fits(clause[0], clause[1])) {
        pieces.push(clause)
      } else {
        pieces.push(...hardSplit(clause))
      }
    }
  }

  const spans: Span[] = []
  let current: Span | null = null
  for (const piece of pieces) {
    if (current && fits(current[0], piece[1])) {
      current = [current[0], piece[1]]
    } else {
      if (current) spans.push(current)
      current = piece
    }
  }
  if (current) spans.push(current)

  return spans.map(([a, b], index) => ({
    chapterId,
    index,
    text: text.slice(atoms[a].start, atoms[b].end),
    wordCount: wordsIn(a, b),
    charCount: charsIn(a, b)
  }))
}
