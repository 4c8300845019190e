/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, maps terminal status to exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, registerBatchCommand, registerReplayCommand } from './run.js';
