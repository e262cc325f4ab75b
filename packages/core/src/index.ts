/**
 * @vecta/core: configuration, errors and logging shared by the vecta
 * packages.
 */

export {
  config,
  defineConfig,
  readVectorDefaults,
  INDEX_WIDTHS,
  type IndexWidth,
  type VectaConfig,
  type VectorDefaults,
} from "./config.js";

export {
  VectaError,
  AllocationError,
  LayoutError,
  PreconditionError,
  ConfigError,
  type VectaErrorCode,
} from "./errors.js";

export { createLogger, type Logger, type LoggerOptions } from "./logger.js";

export { requires } from "./safety.js";
