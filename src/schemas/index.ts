// Config schemas
export {
  ScannerConfigSchema,
  ConfigFileSchema,
  LogLevelSchema,
  type ScannerConfig,
  type ScannerConfigInput,
  type LogLevel,
} from './config.js';

// Script module schemas
export { ScriptModuleSchema, ScriptOutcomeSchema, type ScriptOutcome } from './script.js';
