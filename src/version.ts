import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

export const FALLBACK_VERSION = '0.1.0'

export function resolvePackageVersion(importMetaUrl: string = import.meta.url): string {
  const injected = process.env.CLIPSIFT_VERSION?.trim() ?? ''
  if (injected.length > 0) return injected

  let dir = (() => {
    try {
      return path.dirname(fileURLToPath(importMetaUrl))
    } catch {
      return process.cwd()
    }
  })()

  for (let i = 0; i < 10; i += 1) {
    const candidate = path.join(dir, 'package.json')
    try {
      const json: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'))
      if (
        typeof json === 'object' &&
        json !== null &&
        'name' in json &&
        json.name === 'clipsift' &&
        'version' in json &&
        typeof json.version === 'string' &&
        json.version.trim().length > 0
      ) {
        return json.version.trim()
      }
    } catch {
      // keep walking up
    }

    const parent = path.dirname(dir)
    if (parent === dir) break
    dir = parent
  }

  return FALLBACK_VERSION
}
