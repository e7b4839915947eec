import type { SerializerConfig } from "../../core/config/load-config"
import type { ConfigSource } from "../../ports/config-source"

export type SerializerSettings = Readonly<Partial<Record<keyof SerializerConfig, unknown>>>

/** Settings given in code, typically to override the environment. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly settings: SerializerSettings,
    readonly name = "overrides",
  ) {}

  read(): SerializerSettings {
    return this.settings
  }
}
