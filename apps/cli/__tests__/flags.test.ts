import { describe, expect, test } from "vitest";
import { parseFlags } from "../flags";

describe("parseFlags", () => {
  test("defaults to no overrides", () => {
    expect(parseFlags([])).toEqual({ verbose: false, help: false });
  });

  test("reads long and short forms", () => {
    expect(parseFlags(["--workers", "4", "-f", "10", "--format", "jsonl", "-l", "50", "-v"])).toEqual({
      workers: 4,
      flushEvery: 10,
      format: "jsonl",
      limit: 50,
      verbose: true,
      help: false,
    });
  });

  test("takes a dataset to continue", () => {
    expect(parseFlags(["--continue", "runs/x/x_dataset.csv"]).continueFrom).toBe(
      "runs/x/x_dataset.csv",
    );
  });

  test("continues the latest run when no path follows", () => {
    expect(parseFlags(["--continue"]).continueFrom).toBe("latest");
    expect(parseFlags(["-c", "--verbose"])).toEqual({
      continueFrom: "latest",
      verbose: true,
      help: false,
    });
  });

  test("leaves malformed numbers for validation", () => {
    expect(parseFlags(["--workers", "many"]).workers).toBeNaN();
    expect(parseFlags(["--workers"]).workers).toBeNaN();
  });

  test("recognises help", () => {
    expect(parseFlags(["-h"]).help).toBe(true);
  });
});
