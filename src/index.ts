/**
 * cellkit
 *
 * Self-describing units of computation ("Cells") with typed input/output
 * schemas, validation-wrapped execution and environment-derived config.
 *
 * @package cellkit
 * @version 0.1.0
 * @license MIT
 */

// Cells
export * from './cells/cell.js';
export * from './cells/definition.js';
export * from './cells/errors.js';
export * from './cells/response.js';

// Configuration
export * from './config/configModel.js';

// Schema introspection
export * from './schema/introspect.js';
export * from './schema/jsonSchemaCleaner.js';

// Tool adapters
export * from './tools/functionCell.js';

// Logging
export { createLogger, type LogEntry, type Logger, type LogLevel } from './utils/logger.js';

export const VERSION = '0.1.0';
