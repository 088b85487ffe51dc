import { graphemes, type Style } from "@tui-kanban/core";
import terminalKit from "terminal-kit";

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** One terminal cell. A wide grapheme occupies its cell and marks the next one with `ch: ""`. */
export interface Cell {
  ch: string;
  style: Style;
}

const ELLIPSIS = "…";

export function textWidth(text: string): number {
  return terminalKit.stringWidth(text);
}

export function sameStyle(a: Style, b: Style): boolean {
  return a.fg === b.fg && a.bg === b.bg && a.modifiers.join() === b.modifiers.join();
}

export function inset(rect: Rect, by = 1): Rect {
  return {
    x: rect.x + by,
    y: rect.y + by,
    width: Math.max(0, rect.width - 2 * by),
    height: Math.max(0, rect.height - 2 * by),
  };
}

/** A rectangle of `width` x `height` centered in `outer`, shrunk to fit. */
export function centered(outer: Rect, width: number, height: number): Rect {
  const w = Math.min(width, outer.width);
  const h = Math.min(height, outer.height);
  return {
    x: outer.x + Math.floor((outer.width - w) / 2),
    y: outer.y + Math.floor((outer.height - h) / 2),
    width: w,
    height: h,
  };
}

/** Splits `rect` into rows of the given heights; a height of 0 takes whatever is left. */
export function splitRows(rect: Rect, heights: number[]): Rect[] {
  const fixed = heights.reduce((sum, h) => sum + h, 0);
  const flex = heights.filter((h) => h === 0).length;
  const share = flex > 0 ? Math.max(0, Math.floor((rect.height - fixed) / flex)) : 0;
  let y = rect.y;
  return heights.map((h, i) => {
    const isLast = i === heights.length - 1;
    const height = h === 0 ? (isLast ? Math.max(0, rect.y + rect.height - y) : share) : h;
    const out = { x: rect.x, y, width: rect.width, height: Math.min(height, Math.max(0, rect.y + rect.height - y)) };
    y += out.height;
    return out;
  });
}

export function splitColumns(rect: Rect, count: number): Rect[] {
  if (count <= 0) return [];
  const base = Math.floor(rect.width / count);
  const out: Rect[] = [];
  let x = rect.x;
  for (let i = 0; i < count; i++) {
    const width = i === count - 1 ? rect.x + rect.width - x : base;
    out.push({ x, y: rect.y, width, height: rect.height });
    x += width;
  }
  return out;
}

export function contains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}

/** Word-wraps `text` to `width` columns; words longer than a line are cut. */
export function wrap(text: string, width: number): string[] {
  if (width <= 0) return [];
  const lines: string[] = [];
  for (const paragraph of text.split("\n")) {
    let line = "";
    for (const word of paragraph.split(" ")) {
      const candidate = line ? `${line} ${word}` : word;
      if (textWidth(candidate) <= width) {
        line = candidate;
        continue;
      }
      if (line) lines.push(line);
      line = word;
      while (textWidth(line) > width) {
        const cut = clip(line, width);
        if (!cut) break;
        lines.push(cut);
        line = line.slice(cut.length);
      }
    }
    lines.push(line);
  }
  return lines;
}

/** The longest prefix of `text` that fits in `width` columns. */
export function clip(text: string, width: number): string {
  let out = "";
  let used = 0;
  for (const g of graphemes(text)) {
    const w = textWidth(g);
    if (used + w > width) break;
    out += g;
    used += w;
  }
  return out;
}

/** An off-screen grid of styled cells that the terminal painter copies out row by row. */
export class Frame {
  readonly cells: Cell[][];

  constructor(
    readonly width: number,
    readonly height: number,
    base: Style,
  ) {
    this.cells = Array.from({ length: height }, () =>
      Array.from({ length: width }, () => ({ ch: " ", style: base })),
    );
  }

  get bounds(): Rect {
    return { x: 0, y: 0, width: this.width, height: this.height };
  }

  private setCell(x: number, y: number, ch: string, style: Style): void {
    const row = this.cells[y];
    const cell = row?.[x];
    if (!row || !cell) return;
    row[x] = {
      ch,
      style: {
        fg: style.fg ?? cell.style.fg,
        bg: style.bg ?? cell.style.bg,
        modifiers: style.modifiers,
      },
    };
  }

  /**
   * Writes `text` at (x, y), clipped to `maxWidth` columns; clipped text ends
   * in an ellipsis when `ellipsis` is set. Returns the columns written.
   */
  put(x: number, y: number, text: string, style: Style, maxWidth = this.width - x, ellipsis = false): number {
    const limit = Math.min(maxWidth, this.width - x);
    if (limit <= 0 || y < 0 || y >= this.height) return 0;
    let shown = text;
    if (ellipsis && textWidth(text) > limit) shown = clip(text, Math.max(0, limit - 1)) + ELLIPSIS;
    let col = x;
    for (const g of graphemes(shown)) {
      const w = textWidth(g);
      if (w === 0) continue;
      if (col + w > x + limit) break;
      this.setCell(col, y, g, style);
      if (w === 2) this.setCell(col + 1, y, "", style);
      col += w;
    }
    return col - x;
  }

  fill(rect: Rect, style: Style, ch = " "): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) this.setCell(x, y, ch, style);
    }
  }

  /** Clears `rect` and draws a rounded border with an optional title on the top edge. */
  box(rect: Rect, style: Style, title?: string, titleStyle: Style = style): void {
    if (rect.width < 2 || rect.height < 2) return;
    this.fill(rect, { bg: style.bg, modifiers: [] });
    const right = rect.x + rect.width - 1;
    const bottom = rect.y + rect.height - 1;
    const border = { fg: style.fg, bg: style.bg, modifiers: style.modifiers };
    for (let x = rect.x + 1; x < right; x++) {
      this.setCell(x, rect.y, "─", border);
      this.setCell(x, bottom, "─", border);
    }
    for (let y = rect.y + 1; y < bottom; y++) {
      this.setCell(rect.x, y, "│", border);
      this.setCell(right, y, "│", border);
    }
    this.setCell(rect.x, rect.y, "╭", border);
    this.setCell(right, rect.y, "╮", border);
    this.setCell(rect.x, bottom, "╰", border);
    this.setCell(right, bottom, "╯", border);
    if (title) this.put(rect.x + 2, rect.y, ` ${title} `, titleStyle, rect.width - 4, true);
  }

  /** Row text without styles, wide graphemes counted once. */
  line(y: number): string {
    return (this.cells[y] ?? []).map((c) => c.ch).join("");
  }
}
