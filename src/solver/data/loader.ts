// Word list loader for the CLI. Reads a whitespace-separated text file from
// disk and shares one promise per resolved path between callers.

import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { parseWordList } from '@/solver/words'

export interface WordList {
  path: string // absolute path the list was read from
  words: string[] // uppercase, valid, de-duplicated
  dropped: number // tokens rejected as malformed or duplicate
}

export const DEFAULT_WORDS_FILE = 'wordle_list.txt'

const listCache = new Map<string, Promise<WordList>>()

export function loadWordList(file: string = DEFAULT_WORDS_FILE): Promise<WordList> {
  const abs = path.resolve(file)
  const cached = listCache.get(abs)
  if (cached) return cached
  const p = (async () => {
    let text: string
    try {
      text = await readFile(abs, 'utf8')
    } catch (err) {
      throw new Error(`Failed word list file ${abs}`, { cause: err })
    }
    const tokens = text.split(/\s+/).filter(Boolean).length
    const words = parseWordList(text)
    if (words.length === 0) throw new Error(`Word list ${abs} has no five-letter words`)
    return { path: abs, words, dropped: tokens - words.length }
  })()
  listCache.set(abs, p)
  // failed loads are not cached so a corrected file can be retried
  void p.catch(() => listCache.delete(abs))
  return p
}

// Simple helper to clear caches (used in tests)
export function __clearWordlistCache() {
  listCache.clear()
}
