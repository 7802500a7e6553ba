export {
  LogLevel,
  LOG_LEVEL_ENV,
  EncodeOptionsSchema,
  DecodeOptionsSchema,
  InspectOptionsSchema,
  resolveLogLevel,
  defaultEncodeOutput,
  defaultDecodeOutput,
  describeIssues,
  type LogLevelName,
  type EncodeOptions,
  type DecodeOptions,
  type InspectOptions,
  type VerbosityFlags,
} from './settings.js';
