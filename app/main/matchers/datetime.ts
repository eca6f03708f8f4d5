// ISO 8601 date/time pattern matching

import { parse, isValid } from 'date-fns'
import type { ParseResult } from '../types'
import { matchRegex } from './regex'

type Directive =
  | 'year'
  | 'month'
  | 'dayOfYear'
  | 'day'
  | 'weekday'
  | 'week'
  | 'offsetExtended'
  | 'offsetBasic'
  | 'offset'
  | 'hour'
  | 'minute'
  | 'fraction'
  | 'second'

// Tried in this order at every position of the pattern
const ISO_TOKENS: ReadonlyArray<readonly [string, Directive]> = [
  ['YYYY', 'year'],
  ['MM', 'month'],
  ['DDD', 'dayOfYear'],
  ['DD', 'day'],
  ['D', 'weekday'],
  ['ww', 'week'],
  ['+hh:mm', 'offsetExtended'],
  ['-hh:mm', 'offsetExtended'],
  ['+hhmm', 'offsetBasic'],
  ['-hhmm', 'offsetBasic'],
  ['Z', 'offset'],
  ['hh', 'hour'],
  ['mm', 'minute'],
  ['sss', 'fraction'],
  ['ss', 'second']
]

const DATE_FNS_TOKENS: Record<Exclude<Directive, 'year'>, string> = {
  month: 'MM',
  dayOfYear: 'DDD',
  day: 'dd',
  weekday: 'i',
  week: 'II',
  offsetExtended: 'xxx',
  offsetBasic: 'xx',
  offset: 'XXX',
  hour: 'HH',
  minute: 'mm',
  fraction: 'SSS',
  second: 'ss'
}

// Digits (and signs) each directive takes; the year is always four digits
const DIRECTIVE_SHAPES: Record<Exclude<Directive, 'fraction'>, string> = {
  year: '\\d{4}',
  month: '\\d{1,2}',
  dayOfYear: '\\d{1,3}',
  day: '\\d{1,2}',
  weekday: '\\d',
  week: '\\d{1,2}',
  offsetExtended: '[+-]\\d{2}:\\d{2}',
  offsetBasic: '[+-]\\d{4}',
  offset: 'Z|[+-]\\d{2}(?::?\\d{2})?',
  hour: '\\d{1,2}',
  minute: '\\d{1,2}',
  second: '\\d{1,2}'
}

// Up to six fraction digits; date-fns reads the first three
const FRACTION_SHAPE = '(\\d{1,3})\\d{0,3}'

const REFERENCE_DATE = new Date(2000, 0, 1)

type PatternPart = { directive: Directive } | { literal: string }

function tokenize(pattern: string): PatternPart[] {
  const parts: PatternPart[] = []
  let literal = ''
  let i = 0

  while (i < pattern.length) {
    const rest = pattern.slice(i)
    const hit = ISO_TOKENS.find(([token]) => rest.startsWith(token))
    if (hit) {
      if (literal) {
        parts.push({ literal })
        literal = ''
      }
      parts.push({ directive: hit[1] })
      i += hit[0].length
    } else {
      literal += pattern.charAt(i)
      i += 1
    }
  }
  if (literal) parts.push({ literal })

  return parts
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Check the value against the digit widths of the pattern's directives and return
 * the text date-fns should parse, with fractions cut to milliseconds
 */
function fitShape(parts: PatternPart[], value: string): ParseResult<string> {
  const source = parts
    .map(part => {
      if ('literal' in part) return `(${escapeRegExp(part.literal)})`
      if (part.directive === 'fraction') return FRACTION_SHAPE
      return `(${DIRECTIVE_SHAPES[part.directive]})`
    })
    .join('')

  const match = new RegExp(`^${source}$`).exec(value)
  if (!match) {
    return { ok: false, reason: `"${value}" does not have the shape of the pattern` }
  }
  return { ok: true, value: match.slice(1).join('') }
}

function toDateFnsFormat(parts: PatternPart[]): string {
  const weekBased = parts.some(p => 'directive' in p && (p.directive === 'week' || p.directive === 'weekday'))

  return parts
    .map(part => {
      if ('literal' in part) {
        return `'${part.literal.replace(/'/g, "''")}'`
      }
      if (part.directive === 'year') {
        return weekBased ? 'RRRR' : 'yyyy'
      }
      return DATE_FNS_TOKENS[part.directive]
    })
    .join('')
}

/**
 * Translate an ISO 8601 pattern (e.g. YYYY-MM-DDThh:mm:ss) into a date-fns format string.
 * Week dates (ww, D) read their year as an ISO week-numbering year.
 */
export function isoToDateFnsFormat(pattern: string): string {
  return toDateFnsFormat(tokenize(pattern))
}

/**
 * Parse a value against a date-fns format, requiring the whole value to be consumed
 */
export function parseDateStrict(value: string, format: string): ParseResult<Date> {
  // date-fns tolerates trailing whitespace
  if (/\s$/.test(value)) {
    return { ok: false, reason: 'trailing whitespace' }
  }

  let parsed: Date
  try {
    parsed = parse(value, format, REFERENCE_DATE, { useAdditionalDayOfYearTokens: true })
  } catch (error) {
    // Incompatible token combinations are rejected by date-fns with a RangeError
    return { ok: false, reason: error instanceof Error ? error.message : String(error) }
  }

  if (!isValid(parsed)) {
    return { ok: false, reason: `"${value}" does not match ${format}` }
  }
  return { ok: true, value: parsed }
}

function splitOnce(text: string, separator: string): [string, string] {
  const index = text.indexOf(separator)
  return [text.slice(0, index), text.slice(index + separator.length)]
}

/**
 * Match a value against an ISO 8601 date, time, duration or interval pattern
 */
export function matchDateTime(pattern: string | null | undefined, value: string): boolean {
  if (!pattern) {
    return true
  }

  // Intervals (<start>/<end>, <start>/<duration>, <duration>/<end>) and
  // repeating intervals (Rn/<interval>) are matched part by part
  if (pattern.includes('/')) {
    if (!value.includes('/')) {
      return false
    }
    const [patternHead, patternTail] = splitOnce(pattern, '/')
    const [valueHead, valueTail] = splitOnce(value, '/')
    return matchDateTime(patternHead, valueHead) && matchDateTime(patternTail, valueTail)
  }

  // Durations and repeating interval heads
  if (pattern.startsWith('P') || pattern.startsWith('R')) {
    return matchRegex(`^${pattern.replace(/n/g, '[0-9]+')}$`, value)
  }

  const parts = tokenize(pattern)
  const shaped = fitShape(parts, value)
  return shaped.ok && parseDateStrict(shaped.value, toDateFnsFormat(parts)).ok
}
