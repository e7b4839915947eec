export { CONFIG_ENV_PREFIX, EnvSource } from "./adapters/config/env-source"
export { ObjectSource, type SerializerSettings } from "./adapters/config/object-source"
export { ValueJsonReader } from "./adapters/json/value-json-reader"
export { ValueJsonWriter } from "./adapters/json/value-json-writer"
export { NullLogger } from "./adapters/logger/null-logger"
export {
  PinoLogger,
  type PinoLoggerDeps,
  createPinoLogger,
} from "./adapters/logger/pino-logger"
export {
  type SerializerConfig,
  loadSerializerConfig,
  serializerConfigSchema,
} from "./core/config/load-config"
export {
  type CreateJsonSerializerOptions,
  createJsonSerializer,
  createLoggerFromConfig,
} from "./core/create-serializer"
export { BaseError, type BaseErrorOptions, serializeError } from "./core/errors/base-error"
export {
  ConfigValidationError,
  InvalidWriterStateError,
  MalformedDocumentError,
  type MalformedValueDetails,
  MalformedValueError,
  type SerializationDirection,
  SerializationError,
  UnsupportedTypeError,
} from "./core/errors/errors"
export { isAppError } from "./core/errors/is-app-error"
export { JsonSerializer, type JsonSerializerDeps, ROOT_PATH } from "./core/json-serializer"
export { t } from "./core/types/t"
export type * from "./ports/config-source"
export type * from "./ports/error"
export type * from "./ports/json-converter"
export type * from "./ports/json-reader"
export type * from "./ports/json-value"
export type * from "./ports/json-writer"
export type * from "./ports/log-context"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type * from "./ports/logger"
export type * from "./ports/logger-options"
export type * from "./ports/type-descriptor"
