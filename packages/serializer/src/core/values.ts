export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

/** Token-kind style name of a runtime value, for error messages. */
export function describeValue(value: unknown): string {
  if (value === undefined) return "none"
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}

export function joinPath(parent: string, name: string): string {
  return `${parent}.${name}`
}
