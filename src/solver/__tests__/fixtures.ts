import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { parseWordList } from '@/solver/words'

export const FIXTURE_PATH = fileURLToPath(new URL('./fixtures/words.txt', import.meta.url))

/** 92 five-letter words (plus a few malformed tokens the parser drops) */
export function fixtureWords(): string[] {
  return parseWordList(readFileSync(FIXTURE_PATH, 'utf8'))
}

export const FIVE = ['WRITE', 'WHITE', 'QUITE', 'STARE', 'LATER']

/** Fixture words consistent with RAISE -> 01002, in list order */
export const RAISE_01002 = [
  'PLACE',
  'ANKLE',
  'GLADE',
  'FLAME',
  'BLAME',
  'APPLE',
  'AMBLE',
  'AMPLE',
  'WHALE',
  'ABODE',
  'ADOBE',
  'ANODE',
]
