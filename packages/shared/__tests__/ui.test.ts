import { describe, expect, test } from "vitest";
import { formatDuration, formatProgress } from "../ui";

describe("formatDuration", () => {
  test("uses milliseconds below one second", () => {
    expect(formatDuration(500)).toBe("500ms");
  });

  test("uses seconds below one minute", () => {
    expect(formatDuration(1500)).toBe("1s");
  });

  test("uses minutes and seconds below one hour", () => {
    expect(formatDuration(65_000)).toBe("1m 5s");
  });

  test("uses hours, minutes and seconds", () => {
    expect(formatDuration(3_725_000)).toBe("1h 2m 5s");
  });
});

describe("formatProgress", () => {
  test("shows the count and percentage on the first line", () => {
    const lines = formatProgress({ saved: 5, total: 10, docsPerSec: 2, elapsedMs: 2500 });

    expect(lines).toHaveLength(2);
    expect(lines[0].endsWith(" 5/10 (50.0%)")).toBe(true);
    expect(lines[1]).toContain("2.0 docs/s · 2s");
  });

  test("mentions failures only when there are some", () => {
    const clean = formatProgress({ saved: 1, total: 1, docsPerSec: 1, elapsedMs: 10 });
    const failing = formatProgress({ saved: 1, total: 3, docsPerSec: 1, failed: 2, elapsedMs: 10 });

    expect(clean[1]).not.toContain("failed");
    expect(failing[1]).toContain("2 failed");
  });
});
