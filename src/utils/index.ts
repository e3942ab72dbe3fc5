export { createLogger, createScannerLogger, type LoggerOptions } from './logger.js';
export { errorMessage } from './errors.js';
