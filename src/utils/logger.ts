/**
 * Live execution logger for pagepilot.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 * Never pass credential values through here.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function step(index: number, max: number, description: string): void {
  write(`📋 [${String(index + 1)}/${String(max)}] ${description}`);
}

export function stepResult(
  index: number,
  max: number,
  success: boolean,
  description: string,
): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} [${String(index + 1)}/${String(max)}] ${description}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function snapshot(elementCount: number, url: string): void {
  write(`🔍 Snapshot: ${String(elementCount)} interactive elements on ${url}`);
}

export function login(message: string): void {
  write(`🔐 ${message}`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}

export function loop(message: string): void {
  write(`🔁 ${message}`);
}
