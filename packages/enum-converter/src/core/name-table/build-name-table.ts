import type { EnumDefinition, EnumMember, EnumType } from "@enumjson/serializer"
import type { NameTable, NameTableEntry } from "../../ports/name-table"
import { InvalidEnumDefinitionError } from "../errors"

/**
 * Builds the name table of an enum from its definition.
 *
 * Throws {@link InvalidEnumDefinitionError} for string or non-integer members, for two
 * names sharing one value and for an empty name, which optional fields read as absent.
 */
export function buildNameTable<E extends EnumDefinition>(
  type: EnumType<E>,
): NameTable<EnumMember<E>> {
  const byName = new Map<string, EnumMember<E>>()
  const byValue = new Map<number, string>()
  const members: NameTableEntry<EnumMember<E>>[] = []

  for (const [name, value] of Object.entries(type.definition)) {
    if (isReverseMapping(type.definition, name, value)) continue

    if (name === "") {
      throw new InvalidEnumDefinitionError(type.name, "member names must not be empty")
    }

    if (!isIntegral(type, value)) {
      throw new InvalidEnumDefinitionError(
        type.name,
        `member ${name} must be an integer, got ${JSON.stringify(value)}`,
      )
    }

    const existing = byValue.get(value)
    if (existing !== undefined) {
      throw new InvalidEnumDefinitionError(
        type.name,
        `duplicate value ${value} for ${name} and ${existing}`,
      )
    }

    byName.set(name, value)
    byValue.set(value, name)
    members.push(Object.freeze({ name, value }))
  }

  return Object.freeze({
    enumName: type.name,
    members: Object.freeze(members),
    nameToValue: (name: string) => byName.get(name),
    valueToName: (value: number) => byValue.get(value),
  })
}

/** Entries such as `{ "0": "Read" }` that TypeScript adds to numeric enums. */
function isReverseMapping(definition: EnumDefinition, key: string, value: unknown): boolean {
  if (typeof value !== "string") return false

  const target = definition[value]
  return typeof target === "number" && String(target) === key
}

function isIntegral<E extends EnumDefinition>(
  _type: EnumType<E>,
  value: unknown,
): value is EnumMember<E> {
  return typeof value === "number" && Number.isInteger(value)
}
