#!/usr/bin/env node
/* eslint-env node */
/* eslint-disable no-console */
/**
 * Five-letter guess ranker CLI
 * play (interactive, default), suggest (one-shot) and bench (self-play).
 */

import { buildProgram } from './program'

async function main() {
  await buildProgram().parseAsync(process.argv)
}

main().catch((err) => {
  console.error('[fatal]', err)
  process.exit(1)
})
