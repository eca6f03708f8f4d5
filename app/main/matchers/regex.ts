// Regular expression matching

import type { ParseResult } from '../types'

export function compileRegex(pattern: string): ParseResult<RegExp> {
  try {
    return { ok: true, value: new RegExp(pattern) }
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) }
  }
}

/**
 * Search for the pattern anywhere in the value. An empty pattern always matches,
 * a pattern that does not compile never does.
 */
export function matchRegex(pattern: string | null | undefined, value: string): boolean {
  if (!pattern) {
    return true
  }
  const compiled = compileRegex(pattern)
  return compiled.ok && compiled.value.test(value)
}
