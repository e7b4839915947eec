import {
  type ConverterFactory,
  type EnumDefinition,
  type EnumType,
  type JsonConverter,
  type Logger,
  NullLogger,
  type OptionalType,
  type TypeDescriptor,
} from "@enumjson/serializer"
import { EnumCodec } from "./codec/enum-codec"
import { OptionalEnumCodec } from "./codec/optional-enum-codec"
import {
  NameTableRegistry,
  defaultNameTableRegistry,
} from "./name-table/name-table-registry"

export type EnumConverterFactoryDeps = {
  /** Defaults to the shared {@link defaultNameTableRegistry}. */
  registry?: NameTableRegistry
  logger?: Logger
}

/**
 * Serializes enums and optional enums by member name.
 *
 * @example
 * ```ts
 * const serializer = createJsonSerializer({ converters: [new EnumConverterFactory()] })
 * serializer.serialize(Grant, { user: "ada", access: AccessType.Write })
 * // {"user":"ada","access":"Write"}
 * ```
 */
export class EnumConverterFactory implements ConverterFactory {
  private readonly registry: NameTableRegistry
  private readonly logger: Logger

  constructor(deps: EnumConverterFactoryDeps = {}) {
    this.registry = deps.registry ?? defaultNameTableRegistry
    this.logger = (deps.logger ?? new NullLogger()).child({
      component: "enum-converter-factory",
    })
  }

  canConvert(type: TypeDescriptor): boolean {
    return isEnumType(type) || (type.kind === "optional" && isEnumType(type.inner))
  }

  createConverter(type: TypeDescriptor): JsonConverter<unknown> | null {
    if (isEnumType(type)) return this.forEnum(type)

    if (type.kind === "optional" && isEnumType(type.inner)) {
      return new OptionalEnumCodec(this.forEnum(type.inner))
    }

    return null
  }

  forEnum<E extends EnumDefinition>(type: EnumType<E>): EnumCodec<E> {
    this.logger.debug("creating enum codec", { enumType: type.name, typeKind: type.kind })
    return new EnumCodec(type, this.registry.get(type))
  }

  forOptionalEnum<E extends EnumDefinition>(
    type: OptionalType<EnumType<E>>,
  ): OptionalEnumCodec<E> {
    return new OptionalEnumCodec(this.forEnum(type.inner))
  }
}

function isEnumType(type: TypeDescriptor): type is EnumType {
  return type.kind === "enum"
}
