import { NAMED_COLORS, hexToRgb, type Color, type Style } from "@tui-kanban/core";
import terminalKit from "terminal-kit";
import { sameStyle, type Cell, type Frame } from "./frame";

type Term = typeof terminalKit.terminal;

/** Named colors map onto the 16 ANSI palette entries in their declared order. */
export function ansiIndex(color: Color): number | undefined {
  const index = (NAMED_COLORS as readonly string[]).indexOf(color);
  return index === -1 ? undefined : index;
}

function applyColor(term: Term, color: Color | undefined, layer: "fg" | "bg"): void {
  if (color === undefined) return;
  const rgb = hexToRgb(color);
  if (rgb) {
    if (layer === "fg") term.colorRgb(rgb.r, rgb.g, rgb.b);
    else term.bgColorRgb(rgb.r, rgb.g, rgb.b);
    return;
  }
  const index = ansiIndex(color);
  if (index === undefined) return;
  if (layer === "fg") term.color(index);
  else term.bgColor(index);
}

export function applyStyle(term: Term, style: Style): void {
  term.styleReset();
  applyColor(term, style.fg, "fg");
  applyColor(term, style.bg, "bg");
  for (const modifier of style.modifiers) {
    switch (modifier) {
      case "bold":
        term.bold();
        break;
      case "dim":
        term.dim();
        break;
      case "italic":
        term.italic();
        break;
      case "underlined":
        term.underline();
        break;
      case "slow-blink":
      case "rapid-blink":
        term.blink();
        break;
      case "reversed":
        term.inverse();
        break;
      case "hidden":
        term.hidden();
        break;
      case "crossed-out":
        term.strike();
        break;
    }
  }
}

function sameRow(a: Cell[] | undefined, b: Cell[]): boolean {
  if (!a || a.length !== b.length) return false;
  return a.every((cell, i) => {
    const other = b[i];
    return other !== undefined && cell.ch === other.ch && sameStyle(cell.style, other.style);
  });
}

/** Copies `frame` to the terminal, skipping rows unchanged since `previous`. */
export function paintFrame(term: Term, frame: Frame, previous?: Frame): void {
  const comparable = previous && previous.width === frame.width && previous.height === frame.height;
  for (let y = 0; y < frame.height; y++) {
    const cells = frame.cells[y] ?? [];
    if (comparable && sameRow(previous.cells[y], cells)) continue;
    term.moveTo(1, y + 1);
    let run = "";
    let runStyle: Style | undefined;
    for (const cell of cells) {
      if (cell.ch === "") continue;
      if (runStyle && sameStyle(runStyle, cell.style)) {
        run += cell.ch;
        continue;
      }
      if (runStyle) term.noFormat(run);
      applyStyle(term, cell.style);
      run = cell.ch;
      runStyle = cell.style;
    }
    if (runStyle) term.noFormat(run);
  }
  term.styleReset();
}
