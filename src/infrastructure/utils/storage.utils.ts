import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from "node:fs";
import { dirname } from "node:path";

/**
 * Replace `path` with `data` serialized as JSON. The content goes to a sibling
 * temp file first and is renamed over the target, so readers never see a
 * half-written file.
 */
export function writeJsonAtomic(path: string, data: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  writeFileSync(tmp, JSON.stringify(data, null, 2) + "\n", "utf-8");
  renameSync(tmp, path);
}

export type JsonReadResult =
  | { status: "missing" }
  | { status: "ok"; value: unknown }
  | { status: "corrupt"; error: string };

export function readJsonFile(path: string): JsonReadResult {
  if (!existsSync(path)) return { status: "missing" };
  try {
    const value: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return { status: "ok", value };
  } catch (e) {
    return { status: "corrupt", error: e instanceof Error ? e.message : String(e) };
  }
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}
