import { graphemes, keyChar, type Key } from "./keys";

export interface Pos {
  row: number;
  col: number;
}

/** Every edit records where its text starts; deletes carry the removed text so they can be inverted. */
export type TextEdit =
  | { kind: "InsertChar"; at: Pos; ch: string }
  | { kind: "DeleteChar"; at: Pos; ch: string }
  | { kind: "InsertNewline"; at: Pos }
  | { kind: "DeleteNewline"; at: Pos }
  | { kind: "InsertStr"; at: Pos; text: string }
  | { kind: "DeleteStr"; at: Pos; text: string }
  | { kind: "InsertChunk"; at: Pos; lines: string[] }
  | { kind: "DeleteChunk"; at: Pos; lines: string[] };

interface EditEntry {
  edit: TextEdit;
  before: Pos;
  after: Pos;
}

export type CursorMove =
  | "Forward"
  | "Back"
  | "Up"
  | "Down"
  | "Head"
  | "End"
  | "Top"
  | "Bottom"
  | "WordForward"
  | "WordBack"
  | "ParagraphForward"
  | "ParagraphBack"
  | { type: "Jump"; row: number; col: number }
  | { type: "InViewport"; top: number; height: number };

export type YankText = { kind: "Piece"; text: string } | { kind: "Chunk"; lines: string[] };

export type CharKind = "Space" | "Punctuation" | "Other";

export function charKind(ch: string): CharKind {
  if (/^\s+$/u.test(ch)) return "Space";
  if (/^[\p{P}\p{S}]/u.test(ch)) return "Punctuation";
  return "Other";
}

export interface TextBoxOptions {
  singleLine?: boolean;
  /** Rendered in place of every character, for password fields. */
  mask?: string;
  tabLength?: number;
  hardTab?: boolean;
  maxHistory?: number;
}

const DEFAULT_TAB_LENGTH = 2;
const DEFAULT_MAX_HISTORY = 50;

function chunkOf(edit: TextEdit): string[] {
  switch (edit.kind) {
    case "InsertChar":
    case "DeleteChar":
      return [edit.ch];
    case "InsertNewline":
    case "DeleteNewline":
      return ["", ""];
    case "InsertStr":
    case "DeleteStr":
      return [edit.text];
    case "InsertChunk":
    case "DeleteChunk":
      return edit.lines;
  }
}

function isInsert(edit: TextEdit): boolean {
  return edit.kind.startsWith("Insert");
}

export function invertEdit(edit: TextEdit): TextEdit {
  switch (edit.kind) {
    case "InsertChar":
      return { kind: "DeleteChar", at: edit.at, ch: edit.ch };
    case "DeleteChar":
      return { kind: "InsertChar", at: edit.at, ch: edit.ch };
    case "InsertNewline":
      return { kind: "DeleteNewline", at: edit.at };
    case "DeleteNewline":
      return { kind: "InsertNewline", at: edit.at };
    case "InsertStr":
      return { kind: "DeleteStr", at: edit.at, text: edit.text };
    case "DeleteStr":
      return { kind: "InsertStr", at: edit.at, text: edit.text };
    case "InsertChunk":
      return { kind: "DeleteChunk", at: edit.at, lines: edit.lines };
    case "DeleteChunk":
      return { kind: "InsertChunk", at: edit.at, lines: edit.lines };
  }
}

function comparePos(a: Pos, b: Pos): number {
  return a.row !== b.row ? a.row - b.row : a.col - b.col;
}

/** A line-oriented editable buffer; columns count graphemes. */
export class TextBox {
  private rows: string[][] = [[]];
  private cursorPos: Pos = { row: 0, col: 0 };
  private selectionStart: Pos | undefined;
  private history: EditEntry[] = [];
  private historyIndex = 0;
  private yankText: YankText = { kind: "Piece", text: "" };
  private readonly options: Required<Omit<TextBoxOptions, "mask">> & { mask?: string };
  viewportHeight = 10;

  constructor(text = "", options: TextBoxOptions = {}) {
    this.options = {
      singleLine: options.singleLine ?? false,
      mask: options.mask,
      tabLength: options.tabLength ?? DEFAULT_TAB_LENGTH,
      hardTab: options.hardTab ?? false,
      maxHistory: options.maxHistory ?? DEFAULT_MAX_HISTORY,
    };
    this.setText(text);
  }

  get text(): string {
    return this.lines.join("\n");
  }

  get lines(): string[] {
    return this.rows.map((r) => r.join(""));
  }

  get cursor(): Pos {
    return { ...this.cursorPos };
  }

  get singleLine(): boolean {
    return this.options.singleLine;
  }

  get yank(): YankText {
    return this.yankText;
  }

  set yank(value: YankText) {
    this.yankText = value;
  }

  isEmpty(): boolean {
    return this.rows.length === 1 && this.rows[0].length === 0;
  }

  setMask(mask: string | undefined): void {
    this.options.mask = mask;
  }

  /** Replaces the contents, clears history and selection, and puts the cursor at the end. */
  setText(text: string): void {
    const source = this.options.singleLine ? text.replace(/\r?\n/g, " ") : text;
    this.rows = source.split(/\r?\n/).map(graphemes);
    if (this.rows.length === 0) this.rows = [[]];
    const last = this.rows.length - 1;
    this.cursorPos = { row: last, col: this.rows[last].length };
    this.selectionStart = undefined;
    this.history = [];
    this.historyIndex = 0;
  }

  reset(): void {
    this.setText("");
  }

  /** What a renderer should show: masked, tabs expanded. */
  displayLines(): string[] {
    const mask = this.options.mask;
    const tab = " ".repeat(this.options.tabLength);
    return this.rows.map((r) => (mask ? mask.repeat(r.length) : r.join("").replace(/\t/g, tab)));
  }

  selectionRange(): { start: Pos; end: Pos } | undefined {
    if (!this.selectionStart) return undefined;
    const a = this.selectionStart;
    const b = this.cursorPos;
    if (comparePos(a, b) === 0) return undefined;
    return comparePos(a, b) < 0 ? { start: { ...a }, end: { ...b } } : { start: { ...b }, end: { ...a } };
  }

  startSelection(): void {
    this.selectionStart = { ...this.cursorPos };
  }

  cancelSelection(): void {
    this.selectionStart = undefined;
  }

  selectAll(): void {
    this.selectionStart = { row: 0, col: 0 };
    const last = this.rows.length - 1;
    this.cursorPos = { row: last, col: this.rows[last].length };
  }

  // --- raw edit application ---

  private endOf(at: Pos, chunk: string[]): Pos {
    const parts = chunk.map(graphemes);
    if (parts.length === 1) return { row: at.row, col: at.col + parts[0].length };
    return { row: at.row + parts.length - 1, col: parts[parts.length - 1].length };
  }

  private insertRaw(at: Pos, chunk: string[]): Pos {
    const parts = chunk.map(graphemes);
    const line = this.rows[at.row];
    const head = line.slice(0, at.col);
    const tail = line.slice(at.col);
    if (parts.length === 1) {
      this.rows[at.row] = [...head, ...parts[0], ...tail];
    } else {
      const middle = parts.slice(1, -1);
      const last = parts[parts.length - 1];
      this.rows.splice(at.row, 1, [...head, ...parts[0]], ...middle, [...last, ...tail]);
    }
    return this.endOf(at, chunk);
  }

  private deleteRaw(at: Pos, chunk: string[]): Pos {
    const end = this.endOf(at, chunk);
    const head = this.rows[at.row].slice(0, at.col);
    const tail = this.rows[end.row].slice(end.col);
    this.rows.splice(at.row, end.row - at.row + 1, [...head, ...tail]);
    return { ...at };
  }

  private applyRaw(edit: TextEdit): Pos {
    const chunk = chunkOf(edit);
    return isInsert(edit) ? this.insertRaw(edit.at, chunk) : this.deleteRaw(edit.at, chunk);
  }

  private commit(edit: TextEdit): void {
    const before = { ...this.cursorPos };
    const after = this.applyRaw(edit);
    this.cursorPos = after;
    this.selectionStart = undefined;
    this.history = this.history.slice(0, this.historyIndex);
    this.history.push({ edit, before, after });
    if (this.history.length > this.options.maxHistory) this.history.shift();
    this.historyIndex = this.history.length;
  }

  undo(): boolean {
    if (this.historyIndex === 0) return false;
    const entry = this.history[this.historyIndex - 1];
    this.applyRaw(invertEdit(entry.edit));
    this.cursorPos = { ...entry.before };
    this.selectionStart = undefined;
    this.historyIndex -= 1;
    return true;
  }

  redo(): boolean {
    if (this.historyIndex >= this.history.length) return false;
    const entry = this.history[this.historyIndex];
    this.applyRaw(entry.edit);
    this.cursorPos = { ...entry.after };
    this.selectionStart = undefined;
    this.historyIndex += 1;
    return true;
  }

  private textBetween(start: Pos, end: Pos): string[] {
    if (start.row === end.row) return [this.rows[start.row].slice(start.col, end.col).join("")];
    const out = [this.rows[start.row].slice(start.col).join("")];
    for (let r = start.row + 1; r < end.row; r += 1) out.push(this.rows[r].join(""));
    out.push(this.rows[end.row].slice(0, end.col).join(""));
    return out;
  }

  private deleteRange(start: Pos, end: Pos): boolean {
    if (comparePos(start, end) >= 0) return false;
    const removed = this.textBetween(start, end);
    if (removed.length === 1) {
      const g = graphemes(removed[0]);
      if (g.length === 1) this.commit({ kind: "DeleteChar", at: start, ch: removed[0] });
      else this.commit({ kind: "DeleteStr", at: start, text: removed[0] });
    } else if (removed.length === 2 && removed[0] === "" && removed[1] === "") {
      this.commit({ kind: "DeleteNewline", at: start });
    } else {
      this.commit({ kind: "DeleteChunk", at: start, lines: removed });
    }
    return true;
  }

  private deleteSelection(): boolean {
    const range = this.selectionRange();
    if (!range) return false;
    return this.deleteRange(range.start, range.end);
  }

  // --- insertion ---

  insertChar(ch: string): boolean {
    if (this.options.singleLine && (ch === "\n" || ch === "\r")) return false;
    if (ch === "\n") return this.insertNewline();
    this.deleteSelection();
    this.commit({ kind: "InsertChar", at: { ...this.cursorPos }, ch });
    return true;
  }

  insertStr(text: string): boolean {
    if (!text) return false;
    const lines = text.split(/\r?\n/);
    if (this.options.singleLine && lines.length > 1) return this.insertStr(lines.join(" "));
    this.deleteSelection();
    const at = { ...this.cursorPos };
    if (lines.length === 1) {
      if (graphemes(text).length === 1) this.commit({ kind: "InsertChar", at, ch: text });
      else this.commit({ kind: "InsertStr", at, text });
    } else {
      this.commit({ kind: "InsertChunk", at, lines });
    }
    return true;
  }

  insertNewline(): boolean {
    if (this.options.singleLine) return false;
    this.deleteSelection();
    this.commit({ kind: "InsertNewline", at: { ...this.cursorPos } });
    return true;
  }

  /** Inserts spaces up to the next tab stop, or a hard tab. */
  insertTab(): boolean {
    if (this.options.singleLine) return false;
    if (this.options.hardTab) return this.insertChar("\t");
    const len = this.options.tabLength;
    if (len === 0) return false;
    const pad = len - (this.cursorPos.col % len);
    return this.insertStr(" ".repeat(pad));
  }

  // --- deletion ---

  /** Backspace; at column 0 joins with the previous line. */
  deleteChar(): boolean {
    if (this.deleteSelection()) return true;
    const { row, col } = this.cursorPos;
    if (col > 0) return this.deleteRange({ row, col: col - 1 }, { row, col });
    if (row === 0) return false;
    return this.deleteRange({ row: row - 1, col: this.rows[row - 1].length }, { row, col: 0 });
  }

  deleteNextChar(): boolean {
    if (this.deleteSelection()) return true;
    const { row, col } = this.cursorPos;
    if (col < this.rows[row].length) return this.deleteRange({ row, col }, { row, col: col + 1 });
    if (row >= this.rows.length - 1) return false;
    return this.deleteRange({ row, col }, { row: row + 1, col: 0 });
  }

  deleteLineByEnd(): boolean {
    if (this.deleteSelection()) return true;
    const { row, col } = this.cursorPos;
    if (col >= this.rows[row].length) return this.deleteNextChar();
    return this.deleteRange({ row, col }, { row, col: this.rows[row].length });
  }

  deleteLineByHead(): boolean {
    if (this.deleteSelection()) return true;
    const { row, col } = this.cursorPos;
    if (col === 0) return this.deleteChar();
    return this.deleteRange({ row, col: 0 }, { row, col });
  }

  deleteWord(): boolean {
    if (this.deleteSelection()) return true;
    const { row, col } = this.cursorPos;
    if (col === 0) return this.deleteChar();
    return this.deleteRange({ row, col: this.wordBackCol(row, col) }, { row, col });
  }

  deleteNextWord(): boolean {
    if (this.deleteSelection()) return true;
    const { row, col } = this.cursorPos;
    if (col >= this.rows[row].length) return this.deleteNextChar();
    return this.deleteRange({ row, col }, { row, col: this.wordForwardCol(row, col) });
  }

  // --- clipboard ---

  copy(): boolean {
    const range = this.selectionRange();
    if (!range) return false;
    this.yankText = toYank(this.textBetween(range.start, range.end));
    this.selectionStart = undefined;
    return true;
  }

  cut(): boolean {
    const range = this.selectionRange();
    if (!range) return false;
    this.yankText = toYank(this.textBetween(range.start, range.end));
    return this.deleteRange(range.start, range.end);
  }

  paste(): boolean {
    const y = this.yankText;
    return this.insertStr(y.kind === "Piece" ? y.text : y.lines.join("\n"));
  }

  // --- cursor motion ---

  private wordForwardCol(row: number, col: number): number {
    const line = this.rows[row];
    let i = col;
    const kind = charKind(line[i]);
    if (kind !== "Space") while (i < line.length && charKind(line[i]) === kind) i += 1;
    while (i < line.length && charKind(line[i]) === "Space") i += 1;
    return i;
  }

  private wordBackCol(row: number, col: number): number {
    const line = this.rows[row];
    let i = col;
    while (i > 0 && charKind(line[i - 1]) === "Space") i -= 1;
    if (i === 0) return 0;
    const kind = charKind(line[i - 1]);
    while (i > 0 && charKind(line[i - 1]) === kind) i -= 1;
    return i;
  }

  private target(move: CursorMove): Pos {
    const { row, col } = this.cursorPos;
    const last = this.rows.length - 1;
    const lineLen = (r: number): number => this.rows[r].length;
    if (typeof move !== "string") {
      if (move.type === "Jump") {
        const r = Math.max(0, Math.min(move.row, last));
        return { row: r, col: Math.max(0, Math.min(move.col, lineLen(r))) };
      }
      const bottom = Math.min(last, move.top + Math.max(1, move.height) - 1);
      const r = Math.max(move.top, Math.min(row, bottom));
      return { row: r, col: Math.min(col, lineLen(r)) };
    }
    switch (move) {
      case "Forward":
        if (col < lineLen(row)) return { row, col: col + 1 };
        return row < last ? { row: row + 1, col: 0 } : { row, col };
      case "Back":
        if (col > 0) return { row, col: col - 1 };
        return row > 0 ? { row: row - 1, col: lineLen(row - 1) } : { row, col };
      case "Up":
        return row > 0 ? { row: row - 1, col: Math.min(col, lineLen(row - 1)) } : { row, col };
      case "Down":
        return row < last ? { row: row + 1, col: Math.min(col, lineLen(row + 1)) } : { row, col };
      case "Head":
        return { row, col: 0 };
      case "End":
        return { row, col: lineLen(row) };
      case "Top":
        return { row: 0, col: 0 };
      case "Bottom":
        return { row: last, col: lineLen(last) };
      case "WordForward":
        if (col >= lineLen(row)) return row < last ? { row: row + 1, col: 0 } : { row, col };
        return { row, col: this.wordForwardCol(row, col) };
      case "WordBack":
        if (col === 0) return row > 0 ? { row: row - 1, col: lineLen(row - 1) } : { row, col };
        return { row, col: this.wordBackCol(row, col) };
      case "ParagraphForward": {
        let r = row;
        while (r < last && lineLen(r) > 0) r += 1;
        while (r < last && lineLen(r) === 0) r += 1;
        return { row: r, col: 0 };
      }
      case "ParagraphBack": {
        let r = row > 0 ? row - 1 : 0;
        while (r > 0 && lineLen(r) === 0) r -= 1;
        while (r > 0 && lineLen(r - 1) > 0) r -= 1;
        return { row: r, col: 0 };
      }
    }
  }

  /** Moves the cursor; with `select` the selection is extended, otherwise cleared. */
  move(move: CursorMove, select = false): boolean {
    if (this.options.singleLine && (move === "Up" || move === "Down")) return false;
    if (select && !this.selectionStart) this.startSelection();
    if (!select) this.selectionStart = undefined;
    const next = this.target(move);
    const changed = comparePos(next, this.cursorPos) !== 0;
    this.cursorPos = next;
    return changed;
  }

  scrollPage(direction: "Up" | "Down", select = false): boolean {
    const step = Math.max(1, this.viewportHeight);
    const last = this.rows.length - 1;
    const row =
      direction === "Up" ? Math.max(0, this.cursorPos.row - step) : Math.min(last, this.cursorPos.row + step);
    return this.move({ type: "Jump", row, col: this.cursorPos.col }, select);
  }

  /**
   * Applies an editing key. Returns false for keys the buffer does not
   * handle (Enter and Tab in single-line mode among them) so the caller
   * can treat them as navigation.
   */
  input(k: Key): boolean {
    const ch = keyChar(k);
    if (ch !== undefined) return this.insertChar(ch);

    if (k.ctrl && !k.alt) {
      switch (k.name) {
        case "h":
          return this.deleteChar();
        case "d":
          return this.deleteNextChar();
        case "k":
          return this.deleteLineByEnd();
        case "j":
          return this.deleteLineByHead();
        case "w":
          return this.deleteWord();
        case "z":
          return this.undo();
        case "y":
          return this.redo();
        case "c":
          return this.copy();
        case "x":
          return this.cut();
        case "v":
          return this.paste();
        case "a":
          this.selectAll();
          return true;
        case "left":
          return this.move("WordBack", k.shift);
        case "right":
          return this.move("WordForward", k.shift);
        case "up":
          return this.singleLine ? false : this.move("ParagraphBack", k.shift);
        case "down":
          return this.singleLine ? false : this.move("ParagraphForward", k.shift);
        case "home":
          return this.move("Top", k.shift);
        case "end":
          return this.move("Bottom", k.shift);
        default:
          return false;
      }
    }

    if (k.alt && !k.ctrl) {
      switch (k.name) {
        case "backspace":
          return this.deleteWord();
        case "d":
        case "delete":
          return this.deleteNextWord();
        case "f":
          return this.move("WordForward", k.shift);
        case "b":
          return this.move("WordBack", k.shift);
        default:
          return false;
      }
    }

    switch (k.name) {
      case "enter":
        return this.insertNewline();
      case "tab":
        return this.insertTab();
      case "backspace":
        return this.deleteChar();
      case "delete":
        return this.deleteNextChar();
      case "left":
        return this.move("Back", k.shift);
      case "right":
        return this.move("Forward", k.shift);
      case "up":
        return this.move("Up", k.shift);
      case "down":
        return this.move("Down", k.shift);
      case "home":
        return this.move("Head", k.shift);
      case "end":
        return this.move("End", k.shift);
      case "pageup":
        return this.singleLine ? false : this.scrollPage("Up", k.shift);
      case "pagedown":
        return this.singleLine ? false : this.scrollPage("Down", k.shift);
      default:
        return false;
    }
  }
}

function toYank(lines: string[]): YankText {
  return lines.length === 1 ? { kind: "Piece", text: lines[0] } : { kind: "Chunk", lines };
}
