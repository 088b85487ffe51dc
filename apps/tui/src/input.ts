import { NAMED_KEYS, key, type Key, type MouseEvent } from "@tui-kanban/core";

const NAMED: Record<string, string> = {
  ENTER: "enter",
  KP_ENTER: "enter",
  ESCAPE: "esc",
  BACKSPACE: "backspace",
  DELETE: "delete",
  TAB: "tab",
  INSERT: "insert",
  HOME: "home",
  END: "end",
  PAGE_UP: "pageup",
  PAGE_DOWN: "pagedown",
  UP: "up",
  DOWN: "down",
  LEFT: "left",
  RIGHT: "right",
  SPACE: "space",
};

const MODIFIERS = ["CTRL_", "ALT_", "META_", "SHIFT_"] as const;

/**
 * Maps a terminal-kit key event to a {@link Key}. terminal-kit reports
 * printable input as the character itself and everything else as an
 * upper-case name such as `CTRL_C`, `ALT_BACKSPACE` or `SHIFT_TAB`.
 */
export function keyFromTerminal(name: string, isCharacter: boolean): Key | undefined {
  if (isCharacter) return name === " " ? key("space") : key(name);

  let rest = name;
  let ctrl = false;
  let alt = false;
  let shift = false;
  for (let matched = true; matched; ) {
    matched = false;
    for (const prefix of MODIFIERS) {
      if (!rest.startsWith(prefix) || rest.length === prefix.length) continue;
      rest = rest.slice(prefix.length);
      if (prefix === "CTRL_") ctrl = true;
      else if (prefix === "SHIFT_") shift = true;
      else alt = true;
      matched = true;
    }
  }

  if (rest === "TAB" && shift && !ctrl && !alt) return key("backtab");
  const named = NAMED[rest] ?? (/^F\d{1,2}$/.test(rest) ? rest.toLowerCase() : undefined);
  if (named && NAMED_KEYS.has(named)) return key(named, { ctrl, alt, shift });
  if (/^[A-Z0-9]$/.test(rest)) {
    const ch = shift && !ctrl ? rest : rest.toLowerCase();
    return key(ch, { ctrl, alt });
  }
  return undefined;
}

export interface TerminalMouseData {
  x: number;
  y: number;
  ctrl?: boolean;
}

/** terminal-kit coordinates are 1-based; regions are 0-based. */
export function mouseFromTerminal(name: string, data: TerminalMouseData): MouseEvent | undefined {
  const x = data.x - 1;
  const y = data.y - 1;
  switch (name) {
    case "MOUSE_LEFT_BUTTON_PRESSED":
      return { type: "press", button: "left", x, y };
    case "MOUSE_RIGHT_BUTTON_PRESSED":
      return { type: "press", button: "right", x, y };
    case "MOUSE_MIDDLE_BUTTON_PRESSED":
      return { type: "press", button: "middle", x, y };
    case "MOUSE_LEFT_BUTTON_RELEASED":
      return { type: "release", x, y };
    // Ctrl turns the wheel sideways: down scrolls left, up scrolls right.
    case "MOUSE_WHEEL_UP":
      return { type: "scroll", direction: data.ctrl ? "Right" : "Up", x, y };
    case "MOUSE_WHEEL_DOWN":
      return { type: "scroll", direction: data.ctrl ? "Left" : "Down", x, y };
    case "MOUSE_MOTION":
      return { type: "move", x, y };
    case "MOUSE_DRAG":
      return { type: "drag", x, y };
    default:
      return undefined;
  }
}
