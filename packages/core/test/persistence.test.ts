import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { IntegrityError } from "../src/errors";
import { createBoard, createCard, isStatusCoherent, setCardStatus } from "../src/model";
import {
  decodeBoardsJson,
  deleteSaveFile,
  encodeBoards,
  exportBoards,
  latestSaveFile,
  listSaveFiles,
  nextSaveVersion,
  parseSaveFileName,
  readExport,
  saveBoardsLocally,
  saveFileName,
  saveRequired,
} from "../src/persistence";

function sampleBoards() {
  const now = new Date(2030, 2, 15, 9, 30);
  const done = createCard({ name: "Ship", status: "Complete", now });
  const open = createCard({ name: "Plan", description: "line one\nline two", tags: ["urgent"], comments: ["hi"], now });
  return [createBoard({ name: "Todo", cards: [open, done] }), createBoard({ name: "Empty" })];
}

describe("save file names", () => {
  it("formats and parses day, month, year and version", () => {
    const name = saveFileName(new Date(2030, 2, 5), 3);
    expect(name).toBe("kanban_05-03-2030_v3.json");
    expect(parseSaveFileName(name)).toEqual({ fileName: name, day: 5, month: 3, year: 2030, version: 3 });
  });

  it("rejects names that are not save files or carry impossible dates", () => {
    expect(parseSaveFileName("kanban_export.json")).toBeUndefined();
    expect(parseSaveFileName("kanban_31-02-2030_v1.json")).toBeUndefined();
  });

  it("numbers versions per day", () => {
    const files = ["kanban_15-03-2030_v1.json", "kanban_15-03-2030_v4.json", "kanban_14-03-2030_v9.json"].flatMap(
      (n) => parseSaveFileName(n) ?? [],
    );
    expect(nextSaveVersion(files, new Date(2030, 2, 15))).toBe(5);
    expect(nextSaveVersion(files, new Date(2030, 2, 16))).toBe(1);
  });
});

describe("board encoding", () => {
  it("decodes what it encodes", () => {
    const boards = sampleBoards();
    expect(decodeBoardsJson(encodeBoards(boards))).toEqual(boards);
  });

  it("rejects broken documents with integrity errors", () => {
    expect(() => decodeBoardsJson("{")).toThrow(IntegrityError);
    expect(() => decodeBoardsJson("{}")).toThrow("Invalid save: expected a list of boards");
    const [board] = sampleBoards();
    const dup = board ? [board, { ...board, cards: [] }] : [];
    expect(() => decodeBoardsJson(JSON.stringify(dup))).toThrow(/duplicate id/);
  });

  it("keeps completed-at coherent with status", () => {
    const card = createCard({ name: "x" });
    expect(isStatusCoherent(card)).toBe(true);
    setCardStatus(card, "Complete", new Date(2030, 0, 1));
    expect(isStatusCoherent(card)).toBe(true);
    expect(card.completedAt).toBe(new Date(2030, 0, 1).toISOString());
    setCardStatus(card, "Stale");
    expect(card.completedAt).toBe("Not Set");
    expect(isStatusCoherent(card)).toBe(true);
  });
});

describe("local saves", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "kanban-saves-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes increasing versions and finds the latest", async () => {
    const now = new Date(2030, 2, 15);
    const boards = sampleBoards();
    expect(await saveBoardsLocally({ saveDir: dir, boards, now })).toBe("kanban_15-03-2030_v1.json");
    expect(await saveBoardsLocally({ saveDir: dir, boards, now })).toBe("kanban_15-03-2030_v2.json");
    expect((await latestSaveFile(dir))?.fileName).toBe("kanban_15-03-2030_v2.json");
  });

  it("lists a missing directory as empty", async () => {
    expect(await listSaveFiles(path.join(dir, "missing"))).toEqual([]);
  });

  it("only saves when the boards differ from the latest save", async () => {
    const boards = sampleBoards();
    expect(await saveRequired(dir, boards)).toBe(true);
    await saveBoardsLocally({ saveDir: dir, boards, now: new Date(2030, 2, 15) });
    expect(await saveRequired(dir, boards)).toBe(false);
    expect(await saveRequired(dir, boards.slice(1))).toBe(true);
  });

  it("deletes only save files", async () => {
    const name = await saveBoardsLocally({ saveDir: dir, boards: [], now: new Date(2030, 2, 15) });
    expect(await deleteSaveFile(dir, name)).toBe(true);
    expect(await deleteSaveFile(dir, name)).toBe(false);
    await expect(deleteSaveFile(dir, "config.json")).rejects.toThrow("Not a save file: config.json");
  });

  it("exports boards with version and date", async () => {
    const boards = sampleBoards();
    const filePath = await exportBoards({ saveDir: dir, boards, now: new Date(2030, 2, 15) });
    expect(path.basename(filePath)).toBe("kanban_export.json");
    const doc = await readExport(filePath);
    expect(doc.export_date).toBe("15-03-2030");
    expect(doc.kanban_version).toBe("0.1.0");
    expect(doc.boards).toEqual(boards);
  });
});
