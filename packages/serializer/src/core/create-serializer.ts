import { NullLogger } from "../adapters/logger/null-logger"
import { type PinoLoggerDeps, createPinoLogger } from "../adapters/logger/pino-logger"
import type { ConfigSource } from "../ports/config-source"
import type { ConverterFactory } from "../ports/json-converter"
import type { Logger } from "../ports/logger"
import { type SerializerConfig, loadSerializerConfig } from "./config/load-config"
import { JsonSerializer } from "./json-serializer"

export function createLoggerFromConfig(
  config: SerializerConfig,
  deps: PinoLoggerDeps = {},
): Logger {
  return createPinoLogger(
    deps,
    { level: config.LOG_LEVEL, prettify: config.LOG_PRETTY },
    { component: "enumjson" },
  )
}

export type CreateJsonSerializerOptions = {
  converters?: readonly ConverterFactory[]
  /** Used as is; `config` and `sources` are then ignored. */
  logger?: Logger
  /** Settings for a pino logger. Takes precedence over `sources`. */
  config?: SerializerConfig
  /** Loaded with {@link loadSerializerConfig} when no `config` is given. */
  sources?: readonly ConfigSource[]
  /** Passed to the pino logger built from `config` or `sources`. */
  loggerDeps?: PinoLoggerDeps
}

/**
 * Builds a serializer. Without `logger`, `config` or `sources` it stays silent, so
 * libraries embedding it log nothing unless asked to.
 */
export function createJsonSerializer(
  options: CreateJsonSerializerOptions = {},
): JsonSerializer {
  return new JsonSerializer({
    converters: options.converters ?? [],
    logger: resolveLogger(options),
  })
}

function resolveLogger({ logger, config, sources, loggerDeps }: CreateJsonSerializerOptions) {
  if (logger) return logger

  const settings = config ?? (sources && loadSerializerConfig(sources))
  return settings ? createLoggerFromConfig(settings, loggerDeps) : new NullLogger()
}
