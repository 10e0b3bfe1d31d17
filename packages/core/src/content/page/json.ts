export type JsonRecord = Record<string, unknown>
export type JsonPath = readonly (string | number)[]

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function getJsonPath(value: unknown, path: JsonPath): unknown {
  let current: unknown = value
  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current)) return undefined
      current = current[key]
      continue
    }
    if (!isJsonRecord(current)) return undefined
    current = current[key]
  }
  return current
}

export function getJsonString(value: unknown, path: JsonPath): string | null {
  const found = getJsonPath(value, path)
  return typeof found === 'string' ? found : null
}

export function getJsonArray(value: unknown, path: JsonPath): unknown[] {
  const found = getJsonPath(value, path)
  return Array.isArray(found) ? found : []
}

export function asRecordArray(value: unknown): JsonRecord[] {
  if (!Array.isArray(value)) return []
  return value.filter((v): v is JsonRecord => isJsonRecord(v))
}

export function nonEmpty(value: string | null): string | null {
  const trimmed = value?.trim() ?? ''
  return trimmed.length > 0 ? trimmed : null
}
