import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { basename, dirname, isAbsolute, join, resolve, sep } from "node:path";

/**
 * Canonical absolute form of a path: `~` expanded, `.`/`..` collapsed and
 * symlinks resolved. Components that do not exist yet are kept as written
 * beneath the deepest ancestor that does.
 */
export function normalize(path: string): string {
  const absolute = resolve(expandHome(path));
  const missing: string[] = [];
  let current = absolute;

  while (true) {
    try {
      const real = realpathSync.native(current);
      return missing.length > 0 ? join(real, ...missing.reverse()) : real;
    } catch (err) {
      if (!isMissing(err)) throw err;
      const parent = dirname(current);
      if (parent === current) return absolute;
      missing.push(basename(current));
      current = parent;
    }
  }
}

/**
 * Identities a path may be recorded under: the path as given and, unless it
 * is absolute or already starts with the root's components, the path
 * resolved against root.
 */
export function identityIds(path: string, root: string): Set<string> {
  const ids = new Set([normalize(path)]);
  if (!isAbsolute(expandHome(path)) && !startsWithComponents(path, root)) {
    ids.add(normalize(join(expandHome(root), path)));
  }
  return ids;
}

export function buildIdentitySet(paths: Iterable<string>, root: string): Set<string> {
  const ids = new Set<string>();
  for (const path of paths) {
    for (const id of identityIds(path, root)) ids.add(id);
  }
  return ids;
}

function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/") || path.startsWith(`~${sep}`)) return join(homedir(), path.slice(2));
  return path;
}

function components(path: string): string[] {
  return path.split(/[\\/]+/).filter((part) => part !== "" && part !== ".");
}

function startsWithComponents(path: string, root: string): boolean {
  const rootParts = components(root);
  const pathParts = components(path);
  if (rootParts.length === 0 || rootParts.length > pathParts.length) return false;
  return rootParts.every((part, i) => pathParts[i] === part);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
