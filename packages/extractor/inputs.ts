import { stat } from "node:fs/promises";
import { extname, join } from "node:path";
import type { Storage } from "@pagesift/shared";
import { ConfigError } from "./errors";
import type { DocumentRef } from "./types";

/**
 * Every document under the input root with one of the given extensions,
 * sorted. Refs are the root joined with each file's relative key.
 */
export async function listInputDocuments(
  storage: Storage,
  root: string,
  extensions: readonly string[],
): Promise<DocumentRef[]> {
  await assertDirectory(storage.basePath);

  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const refs: DocumentRef[] = [];

  for await (const key of storage.list("")) {
    if (key.split("/").some((part) => part.startsWith("."))) continue;
    if (!wanted.has(extname(key).toLowerCase())) continue;
    refs.push(join(root, key));
  }

  return refs.sort();
}

async function assertDirectory(path: string): Promise<void> {
  try {
    if ((await stat(path)).isDirectory()) return;
  } catch (err) {
    throw new ConfigError(`Input root folder not found: ${path}`, { cause: err });
  }
  throw new ConfigError(`Input root is not a folder: ${path}`);
}
