import type {
  BooleanType,
  EnumDefinition,
  EnumType,
  NumberType,
  OptionalType,
  RecordFields,
  RecordType,
  StringType,
  TypeDescriptor,
} from "../../ports/type-descriptor"

const stringType: StringType = Object.freeze({ kind: "string" })
const numberType: NumberType = Object.freeze({ kind: "number" })
const booleanType: BooleanType = Object.freeze({ kind: "boolean" })

/**
 * Builders for type descriptors.
 *
 * @example
 * ```ts
 * enum AccessType { Read, Write, Admin }
 *
 * const Grant = t.record("Grant", {
 *   user: t.string(),
 *   access: t.optional(t.enum("AccessType", AccessType)),
 * })
 *
 * type Grant = Infer<typeof Grant> // { user: string; access: AccessType | null }
 * ```
 */
export const t = {
  enum<E extends EnumDefinition>(name: string, definition: E): EnumType<E> {
    return Object.freeze({ kind: "enum", name, definition })
  },

  optional<T extends TypeDescriptor>(inner: T): OptionalType<T> {
    return Object.freeze({ kind: "optional", inner })
  },

  string(): StringType {
    return stringType
  },

  number(): NumberType {
    return numberType
  },

  boolean(): BooleanType {
    return booleanType
  },

  record<F extends RecordFields>(name: string, fields: F): RecordType<F> {
    return Object.freeze({ kind: "record", name, fields })
  },
}
