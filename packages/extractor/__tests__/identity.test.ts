import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdirSync, realpathSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { mkdtemp } from "node:fs/promises";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { buildIdentitySet, identityIds, normalize } from "../identity";

describe("normalize", () => {
  let dir: string;
  let real: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pagesift-identity-"));
    real = realpathSync.native(dir);
    mkdirSync(join(dir, "scans"));
    writeFileSync(join(dir, "scans", "p1.png"), "");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("collapses dot segments", () => {
    expect(normalize(join(dir, "scans", "..", "scans", ".", "p1.png"))).toBe(
      join(real, "scans", "p1.png"),
    );
  });

  test("resolves relative paths against the working directory", () => {
    expect(normalize("some-missing-file.png")).toBe(
      join(realpathSync.native(process.cwd()), "some-missing-file.png"),
    );
  });

  test("resolves symlinks to their target", () => {
    symlinkSync(join(dir, "scans"), join(dir, "linked"));
    expect(normalize(join(dir, "linked", "p1.png"))).toBe(join(real, "scans", "p1.png"));
  });

  test("keeps missing components beneath the deepest existing ancestor", () => {
    expect(normalize(join(dir, "later", "p9.png"))).toBe(join(real, "later", "p9.png"));
  });

  test("expands the home directory", () => {
    expect(normalize("~/pagesift-missing/p1.png")).toBe(
      normalize(join(homedir(), "pagesift-missing", "p1.png")),
    );
  });

  test("is idempotent", () => {
    const once = normalize(join(dir, "scans", "p1.png"));
    expect(normalize(once)).toBe(once);
  });
});

describe("identityIds", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pagesift-ids-"));
    writeFileSync(join(dir, "a.png"), "");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("adds the root-joined form for a bare relative path", () => {
    const ids = identityIds("a.png", dir);

    expect(ids).toEqual(new Set([normalize("a.png"), normalize(join(dir, "a.png"))]));
  });

  test("uses only the path itself when it is absolute", () => {
    expect(identityIds(join(dir, "a.png"), dir)).toEqual(new Set([normalize(join(dir, "a.png"))]));
  });

  test("does not join the root twice onto a path that already starts with it", () => {
    expect(identityIds("data/scans/a.png", "data")).toEqual(
      new Set([normalize("data/scans/a.png")]),
    );
    expect(identityIds("./data/a.png", "data/")).toEqual(new Set([normalize("data/a.png")]));
  });

  test("treats an empty root as no root", () => {
    expect(identityIds("a.png", "")).toEqual(new Set([normalize("a.png")]));
  });

  test("relative and absolute forms of one file share an identity", () => {
    const recorded = buildIdentitySet(["a.png"], dir);
    const input = identityIds(join(dir, "a.png"), dir);

    expect([...input].some((id) => recorded.has(id))).toBe(true);
  });
});

describe("buildIdentitySet", () => {
  test("unions the identities of every path", () => {
    const set = buildIdentitySet(["/x/one.png", "/x/two.png"], "/x");
    expect(set).toEqual(new Set([normalize("/x/one.png"), normalize("/x/two.png")]));
  });
});
