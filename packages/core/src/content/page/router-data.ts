import { load } from 'cheerio'
import JSON5 from 'json5'

import { ROUTER_DATA_ASSIGNMENT_PATTERN } from './constants.js'

/**
 * Finds the page state the server-side renderer assigns to `_ROUTER_DATA` and parses it.
 * Returns `null` when no such script exists or none of the parse strategies succeed.
 */
export function extractRouterData(html: string): unknown {
  const $ = load(html)
  for (const script of $('script').toArray()) {
    const body = $(script).text()
    if (!body.includes('_ROUTER_DATA')) continue
    const match = body.match(ROUTER_DATA_ASSIGNMENT_PATTERN)
    if (!match?.[1]) continue
    const parsed = parseEmbeddedJson(match[1])
    if (parsed !== null) return parsed
  }
  return null
}

// `*_id` values past 2^53 (platform item ids are 19 digits) would be rounded by the parser.
const LONG_ID_PATTERN = /("[A-Za-z_]*id"\s*:\s*)(\d{16,})(?=\s*[,}\]])/g

export function quoteLongIds(json: string): string {
  return json.replace(LONG_ID_PATTERN, '$1"$2"')
}

export function parseEmbeddedJson(raw: string): unknown {
  try {
    return JSON.parse(quoteLongIds(raw))
  } catch {
    // fall through
  }

  // Some renders escape the whole blob a second time (`{\"a\":\"b\\/c\"}`); decode it as the
  // body of a string literal first.
  try {
    const unescaped: unknown = JSON.parse(`"${raw}"`)
    if (typeof unescaped === 'string') return JSON.parse(quoteLongIds(unescaped))
  } catch {
    // fall through
  }

  try {
    return JSON5.parse(quoteLongIds(raw))
  } catch {
    return null
  }
}
