import {
  type EnumDefinition,
  type EnumMember,
  type EnumType,
  type Logger,
  NullLogger,
} from "@enumjson/serializer"
import type { NameTable } from "../../ports/name-table"
import { buildNameTable } from "./build-name-table"

export type NameTableRegistryDeps = {
  build?: (type: EnumType) => NameTable
  logger?: Logger
}

/**
 * Build-once cache of name tables, keyed by enum definition.
 *
 * Descriptors created separately for the same enum object share one table.
 * Building is synchronous, so a table is never built twice for one registry.
 */
export class NameTableRegistry {
  private readonly tables = new WeakMap<EnumDefinition, NameTable>()
  private readonly build: (type: EnumType) => NameTable
  private readonly logger: Logger

  constructor(deps: NameTableRegistryDeps = {}) {
    this.build = deps.build ?? buildNameTable
    this.logger = (deps.logger ?? new NullLogger()).child({ component: "name-table-registry" })
  }

  get<E extends EnumDefinition>(type: EnumType<E>): NameTable<EnumMember<E>> {
    let table = this.tables.get(type.definition)

    if (!table) {
      table = this.build(type)
      this.tables.set(type.definition, table)
      this.logger.debug("built name table", {
        enumType: type.name,
        members: table.members.length,
      })
    }

    // tables are stored under their own definition, so the member type matches E
    return table as NameTable<EnumMember<E>>
  }

  has(type: EnumType): boolean {
    return this.tables.has(type.definition)
  }
}

export const defaultNameTableRegistry = new NameTableRegistry()
