/**
 * Report generation module.
 * Deterministic; no LLM calls.
 * Turns a sealed trace into trace.json + report.md artifacts.
 */

export {
  generateMarkdown,
  generateTraceDocument,
  serializeJSON,
  writeTraceArtifacts,
} from './reporter.js';
export type { TraceArtifacts } from './reporter.js';
