import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { normalizeState, StateManager } from "../../../src/connectors/core/state.js";

describe("normalizeState", () => {
  it("accepts the wrapped shape", () => {
    expect(
      normalizeState({
        bookmarks: { blasts: { modify_time: "2021-04-02T00:00:00Z" } },
        currently_syncing: "blasts",
      }),
    ).toEqual({
      bookmarks: { blasts: { modify_time: "2021-04-02T00:00:00Z" } },
      currently_syncing: "blasts",
    });
  });

  it("accepts the bare stream-to-bookmark mapping", () => {
    expect(
      normalizeState({ purchase_log: { date: "2021-03-01T00:00:00Z" } }),
    ).toEqual({
      bookmarks: { purchase_log: { date: "2021-03-01T00:00:00Z" } },
      currently_syncing: null,
    });
  });

  it("drops non-string watermarks", () => {
    expect(normalizeState({ blasts: { modify_time: 12 } })).toEqual({
      bookmarks: { blasts: {} },
      currently_syncing: null,
    });
  });

  it("treats anything else as empty state", () => {
    expect(normalizeState(null)).toEqual({
      bookmarks: {},
      currently_syncing: null,
    });
  });
});

describe("StateManager", () => {
  let tmpDir: string;
  let stateFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sailthru-tap-state-"));
    stateFile = path.join(tmpDir, "state.json");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns empty state when no file exists", () => {
    const mgr = new StateManager(stateFile);
    expect(mgr.getBookmark("blasts", "modify_time")).toBeUndefined();
    expect(mgr.getRawState()).toEqual({ bookmarks: {}, currently_syncing: null });
  });

  it("loads existing state from disk", () => {
    fs.writeFileSync(
      stateFile,
      JSON.stringify({
        bookmarks: { blasts: { modify_time: "2021-04-02T00:00:00Z" } },
      }),
    );
    const mgr = new StateManager(stateFile);
    expect(mgr.getBookmark("blasts", "modify_time")).toBe("2021-04-02T00:00:00Z");
  });

  it("prefers initial state over the file", () => {
    fs.writeFileSync(
      stateFile,
      JSON.stringify({ blasts: { modify_time: "2021-01-01T00:00:00Z" } }),
    );
    const mgr = new StateManager(stateFile, {
      blasts: { modify_time: "2022-01-01T00:00:00Z" },
    });
    expect(mgr.getBookmark("blasts", "modify_time")).toBe("2022-01-01T00:00:00Z");
  });

  it("persists bookmarks on checkpoint", async () => {
    const mgr = new StateManager(stateFile);
    mgr.setBookmark("blast_repeats", "modify_time", "2021-05-01T10:00:00Z");
    mgr.setCurrentlySyncing("blast_repeats");
    await mgr.checkpoint();

    const saved = JSON.parse(fs.readFileSync(stateFile, "utf-8"));
    expect(saved).toEqual({
      bookmarks: { blast_repeats: { modify_time: "2021-05-01T10:00:00Z" } },
      currently_syncing: "blast_repeats",
    });
    expect(fs.existsSync(`${stateFile}.tmp`)).toBe(false);
  });

  it("keeps state in memory without a path", async () => {
    const mgr = new StateManager(null);
    mgr.setBookmark("blasts", "modify_time", "2021-04-02T00:00:00Z");
    await mgr.checkpoint();
    expect(mgr.getBookmark("blasts", "modify_time")).toBe("2021-04-02T00:00:00Z");
  });

  it("hands out copies of its state", () => {
    const mgr = new StateManager(null);
    mgr.setBookmark("blasts", "modify_time", "2021-04-02T00:00:00Z");
    const raw = mgr.getRawState();
    raw.bookmarks.blasts = { modify_time: "changed" };
    expect(mgr.getBookmark("blasts", "modify_time")).toBe("2021-04-02T00:00:00Z");
  });
});
