/** A normalized key press. Character keys carry their case in `name`; `shift` is only set on named keys. */
export interface Key {
  name: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}

export const NAMED_KEYS: ReadonlySet<string> = new Set([
  "enter",
  "backspace",
  "delete",
  "tab",
  "backtab",
  "esc",
  "up",
  "down",
  "left",
  "right",
  "home",
  "end",
  "pageup",
  "pagedown",
  "insert",
  "space",
  "f1",
  "f2",
  "f3",
  "f4",
  "f5",
  "f6",
  "f7",
  "f8",
  "f9",
  "f10",
  "f11",
  "f12",
]);

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

export function graphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (s) => s.segment);
}

function isSingleGrapheme(text: string): boolean {
  return text.length > 0 && graphemes(text).length === 1;
}

export function key(name: string, mods: { ctrl?: boolean; alt?: boolean; shift?: boolean } = {}): Key {
  const named = NAMED_KEYS.has(name);
  return {
    name,
    ctrl: mods.ctrl ?? false,
    alt: mods.alt ?? false,
    shift: named ? (mods.shift ?? false) : false,
  };
}

/** Parses `ctrl-c`, `alt-backspace`, `shift-up`, `D`, `space`; undefined when malformed. */
export function parseKey(raw: string): Key | undefined {
  let rest = raw.trim();
  if (!rest) return undefined;
  const mods = { ctrl: false, alt: false, shift: false };
  for (;;) {
    const lower = rest.toLowerCase();
    if (lower.startsWith("ctrl-") && rest.length > 5) {
      mods.ctrl = true;
      rest = rest.slice(5);
    } else if (lower.startsWith("alt-") && rest.length > 4) {
      mods.alt = true;
      rest = rest.slice(4);
    } else if (lower.startsWith("shift-") && rest.length > 6) {
      mods.shift = true;
      rest = rest.slice(6);
    } else break;
  }
  const lower = rest.toLowerCase();
  if (NAMED_KEYS.has(lower)) return key(lower, mods);
  if (lower === "escape") return key("esc", mods);
  if (lower === "return") return key("enter", mods);
  if (lower === "del") return key("delete", mods);
  if (!isSingleGrapheme(rest)) return undefined;
  if (rest === " ") return key("space", mods);
  const name = mods.shift && !mods.ctrl && !mods.alt ? rest.toUpperCase() : rest;
  return key(name, mods);
}

export function keyToString(k: Key): string {
  const parts: string[] = [];
  if (k.ctrl) parts.push("ctrl");
  if (k.alt) parts.push("alt");
  if (k.shift) parts.push("shift");
  parts.push(k.name);
  return parts.join("-");
}

export function sameKey(a: Key, b: Key): boolean {
  return keyToString(a) === keyToString(b);
}

/** The character a key types, if it is a plain character key. */
export function keyChar(k: Key): string | undefined {
  if (k.ctrl || k.alt) return undefined;
  if (k.name === "space") return " ";
  if (NAMED_KEYS.has(k.name)) return undefined;
  return k.name;
}

export type KeyAction =
  | "quit"
  | "next_focus"
  | "prv_focus"
  | "open_config_menu"
  | "up"
  | "down"
  | "right"
  | "left"
  | "move_card_up"
  | "move_card_down"
  | "move_card_right"
  | "move_card_left"
  | "take_user_input"
  | "stop_user_input"
  | "hide_ui_element"
  | "save_state"
  | "new_board"
  | "new_card"
  | "delete_card"
  | "delete_board"
  | "change_card_status_to_completed"
  | "change_card_status_to_active"
  | "change_card_status_to_stale"
  | "change_card_priority_to_high"
  | "change_card_priority_to_medium"
  | "change_card_priority_to_low"
  | "reset_ui"
  | "go_to_main_menu"
  | "toggle_command_palette"
  | "undo"
  | "redo"
  | "clear_all_toasts"
  | "go_to_previous_view_or_cancel"
  | "accept";

export type KeyBindings = Record<KeyAction, Key[]>;

const DEFAULT_KEY_SPECS: Record<KeyAction, string[]> = {
  quit: ["ctrl-c", "q"],
  next_focus: ["tab"],
  prv_focus: ["backtab"],
  open_config_menu: ["c"],
  up: ["up"],
  down: ["down"],
  right: ["right"],
  left: ["left"],
  move_card_up: ["shift-up"],
  move_card_down: ["shift-down"],
  move_card_right: ["shift-right"],
  move_card_left: ["shift-left"],
  take_user_input: ["i"],
  stop_user_input: ["insert"],
  hide_ui_element: ["h"],
  save_state: ["ctrl-s"],
  new_board: ["b"],
  new_card: ["n"],
  delete_card: ["d"],
  delete_board: ["D"],
  change_card_status_to_completed: ["1"],
  change_card_status_to_active: ["2"],
  change_card_status_to_stale: ["3"],
  change_card_priority_to_high: ["4"],
  change_card_priority_to_medium: ["5"],
  change_card_priority_to_low: ["6"],
  reset_ui: ["r"],
  go_to_main_menu: ["m"],
  toggle_command_palette: ["ctrl-p"],
  undo: ["ctrl-z"],
  redo: ["ctrl-y"],
  clear_all_toasts: ["t"],
  go_to_previous_view_or_cancel: ["esc"],
  accept: ["enter"],
};

export const KEY_ACTIONS = Object.keys(DEFAULT_KEY_SPECS).filter(isKeyAction);

export function isKeyAction(x: unknown): x is KeyAction {
  return typeof x === "string" && Object.prototype.hasOwnProperty.call(DEFAULT_KEY_SPECS, x);
}

function parseSpecs(specs: string[]): Key[] {
  const out: Key[] = [];
  for (const spec of specs) {
    const k = parseKey(spec);
    if (k) out.push(k);
  }
  return out;
}

export function defaultKeyBindings(): KeyBindings {
  return fillBindings({});
}

function fillBindings(partial: Partial<KeyBindings>): KeyBindings {
  const pick = (action: KeyAction): Key[] => partial[action] ?? parseSpecs(DEFAULT_KEY_SPECS[action]);
  return {
    quit: pick("quit"),
    next_focus: pick("next_focus"),
    prv_focus: pick("prv_focus"),
    open_config_menu: pick("open_config_menu"),
    up: pick("up"),
    down: pick("down"),
    right: pick("right"),
    left: pick("left"),
    move_card_up: pick("move_card_up"),
    move_card_down: pick("move_card_down"),
    move_card_right: pick("move_card_right"),
    move_card_left: pick("move_card_left"),
    take_user_input: pick("take_user_input"),
    stop_user_input: pick("stop_user_input"),
    hide_ui_element: pick("hide_ui_element"),
    save_state: pick("save_state"),
    new_board: pick("new_board"),
    new_card: pick("new_card"),
    delete_card: pick("delete_card"),
    delete_board: pick("delete_board"),
    change_card_status_to_completed: pick("change_card_status_to_completed"),
    change_card_status_to_active: pick("change_card_status_to_active"),
    change_card_status_to_stale: pick("change_card_status_to_stale"),
    change_card_priority_to_high: pick("change_card_priority_to_high"),
    change_card_priority_to_medium: pick("change_card_priority_to_medium"),
    change_card_priority_to_low: pick("change_card_priority_to_low"),
    reset_ui: pick("reset_ui"),
    go_to_main_menu: pick("go_to_main_menu"),
    toggle_command_palette: pick("toggle_command_palette"),
    undo: pick("undo"),
    redo: pick("redo"),
    clear_all_toasts: pick("clear_all_toasts"),
    go_to_previous_view_or_cancel: pick("go_to_previous_view_or_cancel"),
    accept: pick("accept"),
  };
}

export function actionLabel(action: KeyAction): string {
  return action
    .split("_")
    .map((w, i) => (i === 0 ? w.charAt(0).toUpperCase() + w.slice(1) : w))
    .join(" ");
}

export function actionForKey(bindings: KeyBindings, k: Key): KeyAction | undefined {
  const wanted = keyToString(k);
  return KEY_ACTIONS.find((a) => bindings[a].some((b) => keyToString(b) === wanted));
}

/** Keys bound to more than one action, with the actions that share them. */
export function findOverlaps(bindings: KeyBindings): Array<{ key: string; actions: KeyAction[] }> {
  const byKey = new Map<string, KeyAction[]>();
  for (const action of KEY_ACTIONS) {
    for (const k of bindings[action]) {
      const s = keyToString(k);
      const list = byKey.get(s) ?? [];
      if (!list.includes(action)) list.push(action);
      byKey.set(s, list);
    }
  }
  return [...byKey.entries()]
    .filter(([, actions]) => actions.length > 1)
    .map(([k, actions]) => ({ key: k, actions }));
}

export type KeyBindingsParse =
  | { ok: true; bindings: KeyBindings; warnings: string[] }
  | { ok: false; error: string };

/** Reads the `keybindings` config object; unknown actions and bad specs are warned about and skipped. */
export function parseKeyBindings(raw: unknown): KeyBindingsParse {
  if (raw === undefined) return { ok: true, bindings: defaultKeyBindings(), warnings: [] };
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    return { ok: false, error: "Invalid keybindings: expected an object" };
  }
  const warnings: string[] = [];
  const partial: Partial<KeyBindings> = {};
  for (const [action, specs] of Object.entries(raw)) {
    if (!isKeyAction(action)) {
      warnings.push(`Unknown keybinding action: ${action}`);
      continue;
    }
    if (!Array.isArray(specs)) {
      warnings.push(`Invalid keybinding for ${action}: expected a list of keys`);
      continue;
    }
    const keys: Key[] = [];
    for (const spec of specs) {
      const k = typeof spec === "string" ? parseKey(spec) : undefined;
      if (k) keys.push(k);
      else warnings.push(`Invalid key '${String(spec)}' for ${action}`);
    }
    if (keys.length > 0) partial[action] = keys;
  }
  const bindings = fillBindings(partial);
  const overlaps = findOverlaps(bindings);
  if (overlaps.length > 0) {
    const first = overlaps[0];
    return {
      ok: false,
      error: `Overlapping keybindings: '${first.key}' is bound to ${first.actions.join(", ")}`,
    };
  }
  return { ok: true, bindings, warnings };
}

export function serializeKeyBindings(bindings: KeyBindings): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const action of KEY_ACTIONS) out[action] = bindings[action].map(keyToString);
  return out;
}
