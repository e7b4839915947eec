export { EnumCodec } from "./core/codec/enum-codec"
export { OptionalEnumCodec } from "./core/codec/optional-enum-codec"
export {
  EnumConverterFactory,
  type EnumConverterFactoryDeps,
} from "./core/enum-converter-factory"
export { InvalidEnumDefinitionError, UnknownEnumMemberError } from "./core/errors"
export { buildNameTable } from "./core/name-table/build-name-table"
export {
  NameTableRegistry,
  type NameTableRegistryDeps,
  defaultNameTableRegistry,
} from "./core/name-table/name-table-registry"
export type { NameTable, NameTableEntry } from "./ports/name-table"
