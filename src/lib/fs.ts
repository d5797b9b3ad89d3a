import { appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

export async function appendJsonLines(filePath: string, rows: readonly unknown[]): Promise<void> {
  if (rows.length === 0) return;
  await ensureDir(dirname(filePath));
  await appendFile(filePath, rows.map((r) => JSON.stringify(r)).join("\n") + "\n", "utf8");
}

/**
 * Read and parse a JSON file; `null` when the file does not exist. Parse errors propagate.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let txt: string;
  try {
    txt = await readFile(filePath, "utf8");
  } catch (e) {
    if (isMissingFile(e)) return null;
    throw e;
  }
  return JSON.parse(txt);
}

/**
 * Parse a JSON-lines file, skipping blank and unparseable lines. Missing file => [].
 */
export async function readJsonLines(filePath: string): Promise<unknown[]> {
  let txt: string;
  try {
    txt = await readFile(filePath, "utf8");
  } catch (e) {
    if (isMissingFile(e)) return [];
    throw e;
  }
  const rows: unknown[] = [];
  for (const line of txt.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      rows.push(JSON.parse(trimmed));
    } catch {
      continue;
    }
  }
  return rows;
}

function isMissingFile(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
