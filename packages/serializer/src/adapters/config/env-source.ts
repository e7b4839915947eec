import type { ConfigSource } from "../../ports/config-source"

export const CONFIG_ENV_PREFIX = "ENUMJSON_"

/** Settings from `ENUMJSON_*` environment variables, prefix stripped. */
export class EnvSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly env: Readonly<Record<string, string | undefined>> = process.env,
    private readonly prefix = CONFIG_ENV_PREFIX,
  ) {
    this.name = `env:${prefix}`
  }

  read(): Record<string, string | undefined> {
    return Object.fromEntries(
      Object.entries(this.env)
        .filter(([key]) => key.startsWith(this.prefix) && key.length > this.prefix.length)
        .map(([key, value]): [string, string | undefined] => [
          key.slice(this.prefix.length),
          value,
        ]),
    )
  }
}
