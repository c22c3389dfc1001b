/**
 * Terminal output helpers shared by the CLI commands.
 */

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";

const KEY_WIDTH = 14;
const BAR_WIDTH = 30;

export interface ProgressStats {
  saved: number;
  total: number;
  docsPerSec: number;
  failed?: number;
  skipped?: number;
  elapsedMs: number;
}

export function header(name = "pagesift", version?: string) {
  console.log();
  console.log(`${BOLD}${CYAN}${name}${RESET}${version ? ` ${DIM}v${version}${RESET}` : ""}`);
  console.log();
}

export function section(title: string) {
  console.log(`${BOLD}${title}${RESET}`);
}

export function keyValue(key: string, value: string | number) {
  console.log(`  ${DIM}${key.padEnd(KEY_WIDTH)}${RESET}${value}`);
}

export function blank() {
  console.log();
}

export function logError(message: string) {
  console.error(`  ${RED}✗${RESET} ${message}`);
}

export function logWarning(message: string) {
  console.warn(`  ${YELLOW}!${RESET} ${message}`);
}

export function progressBar(done: number, total: number, width = BAR_WIDTH): string {
  const ratio = total > 0 ? Math.min(done / total, 1) : 0;
  const filled = Math.round(ratio * width);
  return `${GREEN}${"█".repeat(filled)}${RESET}${DIM}${"░".repeat(width - filled)}${RESET}`;
}

/**
 * Move the cursor up over previously drawn lines and erase them.
 */
export function clearLines(count: number) {
  if (!process.stdout.isTTY) return;
  for (let i = 0; i < count; i++) {
    process.stdout.write("\x1b[1A\x1b[2K");
  }
}

/**
 * Redraw a block of progress lines in place. Returns the number of lines
 * written so the next call knows how many to clear.
 */
export function writeMultiLineProgress(lines: string[], prevLineCount: number): number {
  if (!process.stdout.isTTY) return 0;
  clearLines(prevLineCount);
  process.stdout.write(`${lines.join("\n")}\n`);
  return lines.length;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  if (ms < 1000) return `${ms}ms`;
  return `${seconds}s`;
}

export function formatProgress(stats: ProgressStats): string[] {
  const { saved, total, docsPerSec, failed, skipped, elapsedMs } = stats;
  const percent = total > 0 ? ((saved / total) * 100).toFixed(1) : "0.0";

  const details = [`${docsPerSec.toFixed(1)} docs/s`, formatDuration(elapsedMs)];
  if (skipped) details.push(`${skipped} skipped`);
  if (failed) details.push(`${RED}${failed} failed${RESET}`);

  return [
    `  ${progressBar(saved, total)} ${saved}/${total} (${percent}%)`,
    `  ${DIM}${details.join(" · ")}${RESET}`,
  ];
}
