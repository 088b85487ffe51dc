import fs from "node:fs/promises";
import path from "node:path";
import builtInThemeData from "../data/themes.json";
import { errorMessage } from "./errors";
import { writeJsonAtomic } from "./files";

export const THEME_STYLE_FIELDS = [
  "general_style",
  "list_select_style",
  "card_due_default_style",
  "card_due_warning_style",
  "card_due_overdue_style",
  "card_status_active_style",
  "card_status_completed_style",
  "card_status_stale_style",
  "card_priority_low_style",
  "card_priority_medium_style",
  "card_priority_high_style",
  "keyboard_focus_style",
  "mouse_focus_style",
  "help_key_style",
  "help_text_style",
  "log_error_style",
  "log_warn_style",
  "log_info_style",
  "log_debug_style",
  "error_text_style",
  "inactive_text_style",
  "progress_bar_style",
] as const;

export type ThemeStyleField = (typeof THEME_STYLE_FIELDS)[number];

export const NAMED_COLORS = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "gray",
  "dark-gray",
  "light-red",
  "light-green",
  "light-yellow",
  "light-blue",
  "light-magenta",
  "light-cyan",
  "white",
] as const;

export const STYLE_MODIFIERS = [
  "bold",
  "dim",
  "italic",
  "underlined",
  "slow-blink",
  "rapid-blink",
  "reversed",
  "hidden",
  "crossed-out",
] as const;

export type StyleModifier = (typeof STYLE_MODIFIERS)[number];

/** A named color, `#rrggbb`, or undefined for the terminal default. */
export type Color = string;

export interface Style {
  fg?: Color;
  bg?: Color;
  modifiers: StyleModifier[];
}

export interface Theme {
  name: string;
  styles: Record<ThemeStyleField, Style>;
}

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

export function isHexColor(raw: string): boolean {
  return HEX_COLOR.test(raw.trim());
}

export function isColor(raw: unknown): raw is Color {
  if (typeof raw !== "string") return false;
  return isHexColor(raw) || (NAMED_COLORS as readonly string[]).includes(raw);
}

export function isStyleModifier(raw: unknown): raw is StyleModifier {
  return typeof raw === "string" && (STYLE_MODIFIERS as readonly string[]).includes(raw);
}

export function hexToRgb(hex: string): { r: number; g: number; b: number } | undefined {
  if (!isHexColor(hex)) return undefined;
  const n = Number.parseInt(hex.trim().slice(1), 16);
  return { r: (n >> 16) & 0xff, g: (n >> 8) & 0xff, b: n & 0xff };
}

function parseStyle(raw: unknown): Style | undefined {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return undefined;
  const obj = new Map(Object.entries(raw));
  const fg = obj.get("fg");
  const bg = obj.get("bg");
  const mods = obj.get("modifiers") ?? [];
  if (fg !== undefined && fg !== null && !isColor(fg)) return undefined;
  if (bg !== undefined && bg !== null && !isColor(bg)) return undefined;
  if (!Array.isArray(mods) || !mods.every(isStyleModifier)) return undefined;
  const style: Style = { modifiers: [...mods] };
  if (isColor(fg)) style.fg = fg;
  if (isColor(bg)) style.bg = bg;
  return style;
}

export function parseTheme(raw: unknown): Theme | undefined {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return undefined;
  const obj = new Map(Object.entries(raw));
  const name = obj.get("name");
  const stylesRaw = obj.get("styles");
  if (typeof name !== "string" || !name.trim()) return undefined;
  if (!stylesRaw || typeof stylesRaw !== "object") return undefined;
  const styleMap = new Map(Object.entries(stylesRaw));
  const styles: Partial<Record<ThemeStyleField, Style>> = {};
  for (const field of THEME_STYLE_FIELDS) {
    const style = parseStyle(styleMap.get(field));
    if (!style) return undefined;
    styles[field] = style;
  }
  return { name, styles: completeStyles(styles) };
}

function completeStyles(partial: Partial<Record<ThemeStyleField, Style>>): Record<ThemeStyleField, Style> {
  const at = (field: ThemeStyleField): Style => partial[field] ?? { modifiers: [] };
  return {
    general_style: at("general_style"),
    list_select_style: at("list_select_style"),
    card_due_default_style: at("card_due_default_style"),
    card_due_warning_style: at("card_due_warning_style"),
    card_due_overdue_style: at("card_due_overdue_style"),
    card_status_active_style: at("card_status_active_style"),
    card_status_completed_style: at("card_status_completed_style"),
    card_status_stale_style: at("card_status_stale_style"),
    card_priority_low_style: at("card_priority_low_style"),
    card_priority_medium_style: at("card_priority_medium_style"),
    card_priority_high_style: at("card_priority_high_style"),
    keyboard_focus_style: at("keyboard_focus_style"),
    mouse_focus_style: at("mouse_focus_style"),
    help_key_style: at("help_key_style"),
    help_text_style: at("help_text_style"),
    log_error_style: at("log_error_style"),
    log_warn_style: at("log_warn_style"),
    log_info_style: at("log_info_style"),
    log_debug_style: at("log_debug_style"),
    error_text_style: at("error_text_style"),
    inactive_text_style: at("inactive_text_style"),
    progress_bar_style: at("progress_bar_style"),
  };
}

export function cloneTheme(theme: Theme): Theme {
  const styles = completeStyles({});
  for (const field of THEME_STYLE_FIELDS) {
    const s = theme.styles[field];
    styles[field] = { ...s, modifiers: [...s.modifiers] };
  }
  return { name: theme.name, styles };
}

export function builtInThemes(): Theme[] {
  const out: Theme[] = [];
  for (const raw of builtInThemeData) {
    const theme = parseTheme(raw);
    if (theme) out.push(theme);
  }
  return out;
}

export function defaultTheme(): Theme {
  const theme = builtInThemes().find((t) => t.name === "Default");
  if (!theme) throw new Error("Built-in Default theme is missing");
  return theme;
}

export function themeFileName(name: string): string {
  const safe = name
    .trim()
    .replace(/[^A-Za-z0-9 _-]/g, "")
    .replace(/\s+/g, "_");
  return `${safe || "theme"}.json`;
}

export async function loadCustomThemes(themesDir: string): Promise<{ themes: Theme[]; errors: string[] }> {
  let names: string[];
  try {
    names = await fs.readdir(themesDir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return { themes: [], errors: [] };
    throw error;
  }
  const themes: Theme[] = [];
  const errors: string[] = [];
  for (const name of names.filter((n) => n.endsWith(".json")).sort()) {
    const filePath = path.join(themesDir, name);
    try {
      const theme = parseTheme(JSON.parse(await fs.readFile(filePath, "utf8")));
      if (theme) themes.push(theme);
      else errors.push(`Invalid theme file: ${filePath}`);
    } catch (error) {
      errors.push(`Could not read theme file ${filePath}: ${errorMessage(error)}`);
    }
  }
  return { themes, errors };
}

/** Built-ins first, then custom themes; a custom theme replaces a built-in of the same name. */
export function mergeThemes(builtIn: Theme[], custom: Theme[]): Theme[] {
  const names = new Set(custom.map((t) => t.name));
  return [...builtIn.filter((t) => !names.has(t.name)), ...custom];
}

export async function saveCustomTheme(themesDir: string, theme: Theme): Promise<string> {
  const filePath = path.join(themesDir, themeFileName(theme.name));
  await writeJsonAtomic(filePath, theme);
  return filePath;
}

export function cycleColor(current: Color | undefined, step: 1 | -1): Color | undefined {
  const options: Array<Color | undefined> = [undefined, ...NAMED_COLORS];
  const idx = options.indexOf(current);
  const next = (idx === -1 ? 0 : idx + step + options.length) % options.length;
  return options[next];
}

export function toggleModifier(style: Style, modifier: StyleModifier): Style {
  const has = style.modifiers.includes(modifier);
  return {
    ...style,
    modifiers: has ? style.modifiers.filter((m) => m !== modifier) : [...style.modifiers, modifier],
  };
}
