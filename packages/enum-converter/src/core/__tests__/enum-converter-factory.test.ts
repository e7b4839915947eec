import { type Logger, type TypeDescriptor, t } from "@enumjson/serializer"
import { mock } from "vitest-mock-extended"
import { Access, AccessType } from "../../tests/fixtures/access"
import { readerOf } from "../../tests/utils/tokens"
import { EnumCodec } from "../codec/enum-codec"
import { OptionalEnumCodec } from "../codec/optional-enum-codec"
import { EnumConverterFactory } from "../enum-converter-factory"
import {
  NameTableRegistry,
  defaultNameTableRegistry,
} from "../name-table/name-table-registry"

const handled: [string, TypeDescriptor][] = [
  ["enum", Access],
  ["optional enum", t.optional(Access)],
]

const notHandled: [string, TypeDescriptor][] = [
  ["string", t.string()],
  ["number", t.number()],
  ["optional string", t.optional(t.string())],
  ["doubly optional enum", t.optional(t.optional(Access))],
  ["record", t.record("Grant", { access: Access })],
]

describe("EnumConverterFactory", () => {
  const factory = new EnumConverterFactory({ registry: new NameTableRegistry() })

  describe("canConvert", () => {
    it.each(handled)("accepts %s", (_label, type) => {
      expect(factory.canConvert(type)).toBe(true)
    })

    it.each(notHandled)("declines %s", (_label, type) => {
      expect(factory.canConvert(type)).toBe(false)
    })
  })

  describe("createConverter", () => {
    it("returns an EnumCodec for enums", () => {
      const converter = factory.createConverter(Access)

      expect(converter).toBeInstanceOf(EnumCodec)
      expect(converter?.read(readerOf("Write"))).toBe(AccessType.Write)
    })

    it("returns an OptionalEnumCodec over the unwrapped enum", () => {
      const converter = factory.createConverter(t.optional(Access))

      expect(converter).toBeInstanceOf(OptionalEnumCodec)
      expect(converter).toMatchObject({ inner: { type: Access } })
      expect(converter?.read(readerOf(""))).toBeNull()
    })

    it.each(notHandled)("returns null for %s", (_label, type) => {
      expect(factory.createConverter(type)).toBeNull()
    })
  })

  it("binds codecs to the injected registry", () => {
    const registry = new NameTableRegistry()
    const scoped = new EnumConverterFactory({ registry })

    scoped.forOptionalEnum(t.optional(Access))

    expect(registry.has(Access)).toBe(true)
  })

  it("falls back to the shared registry", () => {
    enum Shade {
      Light,
      Dark,
    }
    const Shades = t.enum("Shade", Shade)

    new EnumConverterFactory().forEnum(Shades)

    expect(defaultNameTableRegistry.has(Shades)).toBe(true)
  })

  it("logs each codec it creates", () => {
    const logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
    const logged = new EnumConverterFactory({ registry: new NameTableRegistry(), logger })

    logged.createConverter(t.optional(Access))

    expect(logger.child).toHaveBeenCalledWith({ component: "enum-converter-factory" })
    expect(logger.debug).toHaveBeenCalledWith("creating enum codec", {
      enumType: "AccessType",
      typeKind: "enum",
    })
  })
})
