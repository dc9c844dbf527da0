/**
 * Live execution logger for promptsmith.
 *
 * All output goes to stderr so stdout stays clean for chat text and JSON output.
 * Emoji prefixes give instant visual context in the terminal.
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

export function llm(message: string): void {
  write(`🧠 ${message}`);
}

export function tool(name: string, depth: number): void {
  write(`🔧 Tool call: ${name} (depth ${String(depth)})`);
}

export function revision(index: number, reason: string): void {
  write(`✏️  Revision ${String(index + 1)}: ${reason}`);
}

export function evaluation(passed: boolean, field: string, requirement: string): void {
  const icon = passed ? '✅' : '❌';
  write(`${icon} ${field}: ${requirement}`);
}
