import path from "node:path";
import { appendJsonLines, readJsonFile, writeJsonFile } from "../lib/fs.js";
import { PaperStateZ, type PaperState, type PaperTradeEvent } from "./types.js";

export function defaultPaperStatePath(): string {
  return path.resolve(process.cwd(), "data/db/paper_state.json");
}

export function defaultPaperTradesPath(): string {
  return path.resolve(process.cwd(), "data/db/paper_trades.jsonl");
}

/**
 * Last saved book, or null when there is none yet. A file that does not match the
 * current state version is treated as absent.
 */
export async function loadPaperState(filePath = defaultPaperStatePath()): Promise<PaperState | null> {
  const doc = await readJsonFile(filePath);
  if (doc === null) return null;
  const parsed = PaperStateZ.safeParse(doc);
  return parsed.success ? parsed.data : null;
}

export async function savePaperState(state: PaperState, filePath = defaultPaperStatePath()): Promise<void> {
  await writeJsonFile(filePath, state);
}

export async function appendPaperEvents(events: readonly PaperTradeEvent[], filePath = defaultPaperTradesPath()): Promise<void> {
  await appendJsonLines(filePath, events);
}

