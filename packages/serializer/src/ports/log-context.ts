import type { TypeKind } from "./type-descriptor"

export type LogContext = {
  component: string

  typeKind: TypeKind
  enumType: string
  members: number

  path: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
