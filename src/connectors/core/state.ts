import * as fs from "node:fs";
import * as path from "node:path";
import type { Bookmarks, PersistedState } from "./types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toBookmarks(value: Record<string, unknown>): Bookmarks {
  const bookmarks: Bookmarks = {};
  for (const [stream, entry] of Object.entries(value)) {
    if (!isPlainObject(entry)) continue;
    const keys: Record<string, string> = {};
    for (const [key, watermark] of Object.entries(entry)) {
      if (typeof watermark === "string") keys[key] = watermark;
    }
    bookmarks[stream] = keys;
  }
  return bookmarks;
}

/**
 * Accepts `{ bookmarks: {...} }` as well as the bare
 * `{ stream: { key: watermark } }` mapping.
 */
export function normalizeState(raw: unknown): PersistedState {
  if (!isPlainObject(raw)) {
    return { bookmarks: {}, currently_syncing: null };
  }
  if ("bookmarks" in raw) {
    return {
      bookmarks: isPlainObject(raw.bookmarks) ? toBookmarks(raw.bookmarks) : {},
      currently_syncing:
        typeof raw.currently_syncing === "string" ? raw.currently_syncing : null,
    };
  }
  return { bookmarks: toBookmarks(raw), currently_syncing: null };
}

export class StateManager {
  private state: PersistedState;
  private readonly filePath: string | null;

  /** A null path keeps state in memory; checkpoints then only report it. */
  constructor(filePath: string | null, initial?: unknown) {
    this.filePath = filePath;
    this.state = normalizeState(initial ?? this.loadFromDisk());
  }

  private loadFromDisk(): unknown {
    if (!this.filePath || !fs.existsSync(this.filePath)) return undefined;
    const raw = fs.readFileSync(this.filePath, "utf-8");
    return raw.trim() === "" ? undefined : JSON.parse(raw);
  }

  private async writeToDisk(filePath: string): Promise<void> {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(this.state, null, 2));
    fs.renameSync(tmp, filePath);
  }

  getBookmark(stream: string, key: string): string | undefined {
    return this.state.bookmarks[stream]?.[key];
  }

  setBookmark(stream: string, key: string, value: string): void {
    this.state.bookmarks[stream] = {
      ...this.state.bookmarks[stream],
      [key]: value,
    };
  }

  setCurrentlySyncing(stream: string | null): void {
    this.state.currently_syncing = stream;
  }

  async checkpoint(): Promise<void> {
    if (this.filePath) await this.writeToDisk(this.filePath);
  }

  getRawState(): PersistedState {
    const bookmarks: Bookmarks = {};
    for (const [stream, keys] of Object.entries(this.state.bookmarks)) {
      bookmarks[stream] = { ...keys };
    }
    return { bookmarks, currently_syncing: this.state.currently_syncing };
  }
}
