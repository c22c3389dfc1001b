import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import type { Storage } from "./types";

/**
 * Create a local filesystem storage adapter.
 * Keys are relative paths within basePath (e.g., "scans/page-001.png").
 */
export function createLocalStorage(basePath: string): Storage {
  const root = resolve(basePath);
  const toPath = (key: string) => join(root, key);

  return {
    basePath: root,

    resolve: toPath,

    async read(key: string): Promise<Uint8Array | null> {
      try {
        return new Uint8Array(await readFile(toPath(key)));
      } catch (err) {
        if (isNotFound(err)) return null;
        throw err;
      }
    },

    async exists(key: string): Promise<boolean> {
      try {
        await stat(toPath(key));
        return true;
      } catch (err) {
        if (isNotFound(err)) return false;
        throw err;
      }
    },

    async *list(prefix: string): AsyncIterable<string> {
      const start = toPath(prefix);
      let entries: string[];
      try {
        entries = await readdir(start, { recursive: true });
      } catch (err) {
        if (isNotFound(err)) return;
        throw err;
      }

      for (const entry of entries.sort()) {
        const full = join(start, entry);
        if ((await stat(full)).isFile()) {
          yield relative(root, full).split(sep).join("/");
        }
      }
    },

    async write(key: string, content: Uint8Array | string): Promise<void> {
      const filePath = toPath(key);
      // Ensure parent directory exists
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content);
    },
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
