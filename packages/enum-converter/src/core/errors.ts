import { BaseError } from "@enumjson/serializer"

/** A name (or, on write, a value) that does not belong to the bound enum. */
export class UnknownEnumMemberError extends BaseError<"unknown_enum_member"> {
  constructor(enumType: string, value: unknown) {
    super(`${quote(value)} is not a member of ${enumType}`, {
      code: "unknown_enum_member",
      context: { enumType, value },
    })
  }
}

export class InvalidEnumDefinitionError extends BaseError<"invalid_enum_definition"> {
  constructor(enumType: string, reason: string) {
    super(`Invalid enum ${enumType}: ${reason}`, {
      code: "invalid_enum_definition",
      context: { enumType },
      isOperational: false,
    })
  }
}

function quote(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value)
}
