import {
  type EnumDefinition,
  type EnumMember,
  type JsonConverter,
  type JsonReader,
  type JsonWriter,
  MalformedValueError,
} from "@enumjson/serializer"
import type { EnumCodec } from "./enum-codec"

/**
 * Enum field that may be absent.
 *
 * Absent is written as `null`. On read both `null` and `""` mean absent, because some
 * producers send an empty string instead of omitting the field. Any other string must
 * be a member name.
 */
export class OptionalEnumCodec<E extends EnumDefinition>
  implements JsonConverter<EnumMember<E> | null>
{
  constructor(readonly inner: EnumCodec<E>) {}

  read(reader: JsonReader): EnumMember<E> | null {
    const kind = reader.tokenKind()

    if (kind === "null") return reader.readNull()
    if (kind !== "string") {
      throw new MalformedValueError({ expected: "string | null", actual: kind })
    }

    const name = reader.readString()
    return name === "" ? null : this.inner.fromName(name)
  }

  write(writer: JsonWriter, value: EnumMember<E> | null): void {
    if (value === null) return writer.writeNull()
    this.inner.write(writer, value)
  }
}
