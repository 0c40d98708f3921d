export {
  createJsonObjectLoader,
  loadJsonObject,
  resolveLoaderOptions,
  type JsonObjectLoader,
  type LoadResult
} from './loader';
export {
  createInjectionRequestSchema,
  requestFromAttributes,
  validateInjectionRequest,
  type RequestSchemaOptions
} from './request-validator';
export { validateWithSchema } from './validator';

export { producePayload, SOURCE_ADAPTERS } from './adapters';
export type { AdapterContext, SourceAdapter } from './adapters';

export {
  buildScriptFragment,
  emitFragment,
  escapeHtmlAttribute,
  escapeScriptStringLiteral,
  parseTargetPath,
  type EmitResult,
  type FragmentOptions,
  type LiteralQuote,
  type ScriptFragment,
  type TargetPath
} from './emitter';
export {
  createBufferedOutput,
  createStreamOutput,
  splitIntoChunks,
  writeChunked,
  type BufferedOutput
} from './output';
export { JsonWriter, quoteJsonString, serializeJsonValue } from './json-writer';
export type { JsonWriterOptions } from './json-writer';
export * from './datasource';

export {
  ConfigurationError,
  ContractViolationError,
  ExecutionError,
  JsonWriterError,
  LoadJsonObjectError,
  QueryExecutionError,
  getErrorMessage,
  isErrorCode,
  type LoadJsonObjectErrorCode
} from './errors';
export {
  Logger,
  createLogger,
  normalizeLogLevel,
  type LogLevel,
  type LogRecord,
  type LoggerOptions
} from './logger';

export type * from './types';
