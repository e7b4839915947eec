/**
 * A TypeScript numeric `enum` object, or an `as const` object mapping names to integers.
 *
 * @remarks
 * Numeric enums also carry reverse-mapping entries (`{ "0": "Read" }`); those are not
 * members and are skipped when a name table is built.
 */
export type EnumDefinition = Readonly<Record<string, string | number>>

export type EnumMember<E extends EnumDefinition> = Extract<E[keyof E], number>

export interface EnumType<E extends EnumDefinition = EnumDefinition> {
  readonly kind: "enum"
  /** Name used in error messages and logs. */
  readonly name: string
  readonly definition: E
}

/** A field that holds either a value of `inner` or nothing (`null`). */
export interface OptionalType<T extends TypeDescriptor = TypeDescriptor> {
  readonly kind: "optional"
  readonly inner: T
}

export interface StringType {
  readonly kind: "string"
}

export interface NumberType {
  readonly kind: "number"
}

export interface BooleanType {
  readonly kind: "boolean"
}

export type RecordFields = Readonly<Record<string, TypeDescriptor>>

export interface RecordType<F extends RecordFields = RecordFields> {
  readonly kind: "record"
  readonly name: string
  readonly fields: F
}

export type TypeDescriptor =
  | EnumType
  | OptionalType
  | StringType
  | NumberType
  | BooleanType
  | RecordType

export type TypeKind = TypeDescriptor["kind"]

/** TypeScript value type described by a descriptor. */
export type Infer<D extends TypeDescriptor> =
  D extends EnumType<infer E extends EnumDefinition>
    ? EnumMember<E>
    : D extends OptionalType<infer I extends TypeDescriptor>
      ? Infer<I> | null
      : D extends StringType
        ? string
        : D extends NumberType
          ? number
          : D extends BooleanType
            ? boolean
            : D extends RecordType<infer F extends RecordFields>
              ? { -readonly [K in keyof F]: Infer<F[K]> }
              : never
