import fs from "node:fs/promises";
import path from "node:path";
import { IntegrityError, errorMessage } from "./errors";
import { readJsonFile, removeIfExists, writeJsonAtomic } from "./files";
import { FIELD_NOT_SET, isCardPriority, isCardStatus, type Board, type Card } from "./model";

export const SAVE_FILE_PREFIX = "kanban";
export const EXPORT_FILE_NAME = "kanban_export.json";
export const KANBAN_VERSION = "0.1.0";

const SAVE_FILE_PATTERN = /^kanban_(\d{2})-(\d{2})-(\d{4})_v(\d+)\.json$/;

export interface SaveFileInfo {
  fileName: string;
  day: number;
  month: number;
  year: number;
  version: number;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `DD-MM-YYYY` in local time. */
export function saveDateStamp(date: Date): string {
  return `${pad2(date.getDate())}-${pad2(date.getMonth() + 1)}-${date.getFullYear()}`;
}

export function saveFileName(date: Date, version: number): string {
  return `${SAVE_FILE_PREFIX}_${saveDateStamp(date)}_v${version}.json`;
}

export function parseSaveFileName(fileName: string): SaveFileInfo | undefined {
  const match = SAVE_FILE_PATTERN.exec(fileName);
  if (!match) return undefined;
  const [, dd, mm, yyyy, v] = match;
  const day = Number(dd);
  const month = Number(mm);
  const year = Number(yyyy);
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) return undefined;
  return { fileName, day, month, year, version: Number(v) };
}

export function compareSaveFiles(a: SaveFileInfo, b: SaveFileInfo): number {
  return a.year - b.year || a.month - b.month || a.day - b.day || a.version - b.version;
}

/** Save files in `saveDir`, oldest first. A missing directory lists as empty. */
export async function listSaveFiles(saveDir: string): Promise<SaveFileInfo[]> {
  let names: string[];
  try {
    names = await fs.readdir(saveDir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw error;
  }
  const out: SaveFileInfo[] = [];
  for (const name of names) {
    const info = parseSaveFileName(name);
    if (info) out.push(info);
  }
  return out.sort(compareSaveFiles);
}

export async function latestSaveFile(saveDir: string): Promise<SaveFileInfo | undefined> {
  const files = await listSaveFiles(saveDir);
  return files[files.length - 1];
}

export function nextSaveVersion(files: SaveFileInfo[], date: Date): number {
  let max = 0;
  for (const f of files) {
    if (f.day === date.getDate() && f.month === date.getMonth() + 1 && f.year === date.getFullYear()) {
      max = Math.max(max, f.version);
    }
  }
  return max + 1;
}

export function encodeBoards(boards: Board[]): string {
  return JSON.stringify(boards, null, 2) + "\n";
}

function readString(obj: Map<string, unknown>, key: string, where: string, fallback?: string): string {
  const value = obj.get(key);
  if (typeof value === "string") return value;
  if (value === undefined && fallback !== undefined) return fallback;
  throw new IntegrityError(`Invalid ${where}: '${key}' must be a string`);
}

function readStringArray(obj: Map<string, unknown>, key: string, where: string): string[] {
  const value = obj.get(key) ?? [];
  if (!Array.isArray(value) || !value.every((x): x is string => typeof x === "string")) {
    throw new IntegrityError(`Invalid ${where}: '${key}' must be a list of strings`);
  }
  return [...value];
}

function asObject(raw: unknown, where: string): Map<string, unknown> {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) throw new IntegrityError(`Invalid ${where}: expected an object`);
  return new Map(Object.entries(raw));
}

function decodeCard(raw: unknown, where: string): Card {
  const obj = asObject(raw, where);
  const status = obj.get("status");
  const priority = obj.get("priority");
  if (!isCardStatus(status)) throw new IntegrityError(`Invalid ${where}: unknown status`);
  if (!isCardPriority(priority)) throw new IntegrityError(`Invalid ${where}: unknown priority`);
  const card: Card = {
    id: readString(obj, "id", where),
    name: readString(obj, "name", where),
    description: readString(obj, "description", where, ""),
    dueDate: readString(obj, "dueDate", where, FIELD_NOT_SET),
    status,
    priority,
    tags: readStringArray(obj, "tags", where),
    comments: readStringArray(obj, "comments", where),
    createdAt: readString(obj, "createdAt", where),
    modifiedAt: readString(obj, "modifiedAt", where),
    completedAt: readString(obj, "completedAt", where, FIELD_NOT_SET),
  };
  if (!card.id || !card.name) throw new IntegrityError(`Invalid ${where}: id and name are required`);
  return card;
}

function decodeBoard(raw: unknown, where: string): Board {
  const obj = asObject(raw, where);
  const cardsRaw = obj.get("cards") ?? [];
  if (!Array.isArray(cardsRaw)) throw new IntegrityError(`Invalid ${where}: 'cards' must be a list`);
  const board: Board = {
    id: readString(obj, "id", where),
    name: readString(obj, "name", where),
    description: readString(obj, "description", where, ""),
    cards: cardsRaw.map((c, i) => decodeCard(c, `${where} card ${i}`)),
  };
  if (!board.id || !board.name) throw new IntegrityError(`Invalid ${where}: id and name are required`);
  return board;
}

/** Validates a parsed save document; throws {@link IntegrityError} on any mismatch. */
export function decodeBoards(raw: unknown): Board[] {
  if (!Array.isArray(raw)) throw new IntegrityError("Invalid save: expected a list of boards");
  const boards = raw.map((b, i) => decodeBoard(b, `board ${i}`));
  const ids = new Set<string>();
  for (const board of boards) {
    for (const id of [board.id, ...board.cards.map((c) => c.id)]) {
      if (ids.has(id)) throw new IntegrityError(`Invalid save: duplicate id ${id}`);
      ids.add(id);
    }
  }
  return boards;
}

export function decodeBoardsJson(text: string): Board[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new IntegrityError(`Invalid save: ${errorMessage(error)}`);
  }
  return decodeBoards(raw);
}

export function boardsEqual(a: Board[], b: Board[]): boolean {
  return encodeBoards(a) === encodeBoards(b);
}

export async function loadSaveFile(saveDir: string, fileName: string): Promise<Board[]> {
  const text = await fs.readFile(path.join(saveDir, fileName), "utf8");
  return decodeBoardsJson(text);
}

/** Writes the next version for today and returns its file name. */
export async function saveBoardsLocally(args: { saveDir: string; boards: Board[]; now?: Date }): Promise<string> {
  const now = args.now ?? new Date();
  await fs.mkdir(args.saveDir, { recursive: true });
  const version = nextSaveVersion(await listSaveFiles(args.saveDir), now);
  const fileName = saveFileName(now, version);
  await fs.writeFile(path.join(args.saveDir, fileName), encodeBoards(args.boards), { encoding: "utf8", flag: "wx" });
  return fileName;
}

export async function deleteSaveFile(saveDir: string, fileName: string): Promise<boolean> {
  if (!parseSaveFileName(fileName)) throw new Error(`Not a save file: ${fileName}`);
  return removeIfExists(path.join(saveDir, fileName));
}

/** True when there is no readable latest save or it differs from `boards`. */
export async function saveRequired(saveDir: string, boards: Board[]): Promise<boolean> {
  const latest = await latestSaveFile(saveDir);
  if (!latest) return true;
  try {
    return !boardsEqual(await loadSaveFile(saveDir, latest.fileName), boards);
  } catch (error) {
    if (error instanceof IntegrityError) return true;
    throw error;
  }
}

export interface ExportDocument {
  kanban_version: string;
  export_date: string;
  boards: Board[];
}

export async function exportBoards(args: { saveDir: string; boards: Board[]; now?: Date }): Promise<string> {
  const filePath = path.join(args.saveDir, EXPORT_FILE_NAME);
  const doc: ExportDocument = {
    kanban_version: KANBAN_VERSION,
    export_date: saveDateStamp(args.now ?? new Date()),
    boards: args.boards,
  };
  await writeJsonAtomic(filePath, doc);
  return filePath;
}

export async function readExport(filePath: string): Promise<ExportDocument> {
  const raw = await readJsonFile(filePath);
  const obj = asObject(raw, "export");
  return {
    kanban_version: readString(obj, "kanban_version", "export"),
    export_date: readString(obj, "export_date", "export"),
    boards: decodeBoards(obj.get("boards")),
  };
}
