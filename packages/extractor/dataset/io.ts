import { appendFileSync, closeSync, fstatSync, openSync, readSync } from "node:fs";

/**
 * Append lines to a file. A file whose last line was cut short (no trailing
 * newline) is terminated first, so new rows never merge into it;
 * `terminateCutLine` supplies that terminator when plain "\n" is not enough.
 */
export function appendLines(
  path: string,
  lines: string[],
  terminateCutLine: () => string = () => "\n",
): void {
  const prefix = lacksTrailingNewline(path) ? terminateCutLine() : "";
  appendFileSync(path, `${prefix}${lines.join("\n")}\n`, "utf8");
}

function lacksTrailingNewline(path: string): boolean {
  let fd: number;
  try {
    fd = openSync(path, "r");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }

  try {
    const { size } = fstatSync(fd);
    if (size === 0) return false;
    const last = Buffer.alloc(1);
    readSync(fd, last, 0, 1, size - 1);
    return last[0] !== 0x0a;
  } finally {
    closeSync(fd);
  }
}
