import {
  type EnumDefinition,
  type EnumMember,
  type EnumType,
  type JsonConverter,
  type JsonReader,
  type JsonWriter,
  MalformedValueError,
} from "@enumjson/serializer"
import type { NameTable } from "../../ports/name-table"
import { UnknownEnumMemberError } from "../errors"

/**
 * Converts enum members to and from their exact member name.
 *
 * `""`, names that differ only in case and numeric strings are all unknown members.
 */
export class EnumCodec<E extends EnumDefinition> implements JsonConverter<EnumMember<E>> {
  constructor(
    readonly type: EnumType<E>,
    private readonly table: NameTable<EnumMember<E>>,
  ) {}

  toName(member: EnumMember<E>): string {
    const name = this.table.valueToName(member)
    if (name === undefined) throw new UnknownEnumMemberError(this.type.name, member)
    return name
  }

  fromName(name: string): EnumMember<E> {
    const member = this.table.nameToValue(name)
    if (member === undefined) throw new UnknownEnumMemberError(this.type.name, name)
    return member
  }

  read(reader: JsonReader): EnumMember<E> {
    const kind = reader.tokenKind()
    if (kind !== "string") throw new MalformedValueError({ expected: "string", actual: kind })

    return this.fromName(reader.readString())
  }

  write(writer: JsonWriter, member: EnumMember<E>): void {
    writer.writeString(this.toName(member))
  }
}
