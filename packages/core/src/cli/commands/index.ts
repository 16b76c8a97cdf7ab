/**
 * CLI Commands
 *
 * Register all CLI commands.
 */

export { registerServicesCommand } from './services.js';
export { registerOperationsCommand } from './operations.js';
export { registerTraceCommand, printTrace } from './trace.js';
export { registerFindCommand, buildCriteria, type FindOptions } from './find.js';
export { registerDepsCommand } from './deps.js';
