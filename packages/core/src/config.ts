import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import process from "node:process";
import { DEFAULT_CALENDAR_FORMAT, isCalendarFormat, type CalendarFormat } from "./date-picker";
import { DEFAULT_DATE_TIME_FORMAT, formatFromHumanReadable, humanReadableFormat, isDateTimeFormat, type DateTimeFormat } from "./dates";
import { errorMessage } from "./errors";
import { writeJsonAtomic } from "./files";
import { defaultKeyBindings, parseKeyBindings, serializeKeyBindings, type KeyBindings } from "./keys";
import { isView, viewFromLabel, viewLabel, type View } from "./ui-state";

export const APP_DIR_NAME = "tui-kanban";
export const CONFIG_FILE_NAME = "config.json";
export const THEME_DIR_NAME = "themes";
export const LOG_FILE_NAME = "kanban.log";
export const ENCRYPTION_KEY_FILE_NAME = "kanban_encryption_key";
export const ACCESS_TOKEN_FILE_NAME = "kanban_access_token";

export const MIN_TICKRATE = 10;
export const MAX_TICKRATE = 1000;
export const DEFAULT_TICKRATE = 50;
export const MIN_WARNING_DELTA = 1;
export const MAX_WARNING_DELTA = 30;
export const DEFAULT_WARNING_DELTA = 3;
export const MIN_BOARDS_SHOWN = 1;
export const MAX_BOARDS_SHOWN = 10;
export const DEFAULT_BOARDS_SHOWN = 3;
export const MIN_CARDS_SHOWN = 1;
export const MAX_CARDS_SHOWN = 20;
export const DEFAULT_CARDS_SHOWN = 4;
export const DEFAULT_VIEW: View = "TitleBodyHelpLog";
export const DEFAULT_THEME_NAME = "Default";

export interface AppConfig {
  saveDirectory: string;
  defaultView: View;
  tickrate: number;
  autoSave: boolean;
  alwaysLoadLastSave: boolean;
  saveOnExit: boolean;
  enableMouseSupport: boolean;
  autoLogin: boolean;
  showLineNumbers: boolean;
  disableScrollBar: boolean;
  disableAnimations: boolean;
  defaultTheme: string;
  dateTimeFormat: DateTimeFormat;
  datePickerCalendarFormat: CalendarFormat;
  warningDelta: number;
  boardsShown: number;
  cardsShown: number;
  keybindings: KeyBindings;
}

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.KANBAN_CONFIG_DIR) return path.resolve(env.KANBAN_CONFIG_DIR);
  if (env.XDG_CONFIG_HOME) return path.join(env.XDG_CONFIG_HOME, APP_DIR_NAME);
  return path.join(os.homedir(), ".config", APP_DIR_NAME);
}

export function getDefaultSaveDirectory(env: NodeJS.ProcessEnv = process.env): string {
  if (env.KANBAN_CONFIG_DIR) return path.join(path.resolve(env.KANBAN_CONFIG_DIR), "saves");
  if (env.XDG_DATA_HOME) return path.join(env.XDG_DATA_HOME, APP_DIR_NAME, "saves");
  return path.join(os.homedir(), ".local", "share", APP_DIR_NAME, "saves");
}

export function getConfigPath(configDir: string): string {
  return path.join(configDir, CONFIG_FILE_NAME);
}

export function getThemesDir(configDir: string): string {
  return path.join(configDir, THEME_DIR_NAME);
}

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    saveDirectory: getDefaultSaveDirectory(env),
    defaultView: DEFAULT_VIEW,
    tickrate: DEFAULT_TICKRATE,
    autoSave: true,
    alwaysLoadLastSave: true,
    saveOnExit: true,
    enableMouseSupport: true,
    autoLogin: true,
    showLineNumbers: true,
    disableScrollBar: false,
    disableAnimations: false,
    defaultTheme: DEFAULT_THEME_NAME,
    dateTimeFormat: DEFAULT_DATE_TIME_FORMAT,
    datePickerCalendarFormat: DEFAULT_CALENDAR_FORMAT,
    warningDelta: DEFAULT_WARNING_DELTA,
    boardsShown: DEFAULT_BOARDS_SHOWN,
    cardsShown: DEFAULT_CARDS_SHOWN,
    keybindings: defaultKeyBindings(),
  };
}

export type BooleanConfigKey =
  | "autoSave"
  | "alwaysLoadLastSave"
  | "saveOnExit"
  | "enableMouseSupport"
  | "autoLogin"
  | "showLineNumbers"
  | "disableScrollBar"
  | "disableAnimations";
type NumberKey = "tickrate" | "warningDelta" | "boardsShown" | "cardsShown";

export type ConfigField =
  | { key: "saveDirectory"; json: "save_directory"; label: string; kind: "path" }
  | { key: "defaultView"; json: "default_view"; label: string; kind: "view" }
  | { key: BooleanConfigKey; json: string; label: string; kind: "boolean" }
  | { key: NumberKey; json: string; label: string; kind: "number"; min: number; max: number }
  | { key: "defaultTheme"; json: "default_theme"; label: string; kind: "theme" }
  | { key: "dateTimeFormat"; json: "date_time_format"; label: string; kind: "dateFormat" }
  | { key: "datePickerCalendarFormat"; json: "date_picker_calender_format"; label: string; kind: "calendarFormat" }
  | { key: "keybindings"; json: "keybindings"; label: string; kind: "keybindings" };

/** Config menu rows, in display order. */
export const CONFIG_FIELDS: readonly ConfigField[] = [
  { key: "saveDirectory", json: "save_directory", label: "Save Directory", kind: "path" },
  { key: "defaultView", json: "default_view", label: "Select Default View", kind: "view" },
  { key: "alwaysLoadLastSave", json: "always_load_last_save", label: "Auto Load Last Save", kind: "boolean" },
  { key: "autoSave", json: "auto_save", label: "Auto Save", kind: "boolean" },
  { key: "saveOnExit", json: "save_on_exit", label: "Auto Save on Exit", kind: "boolean" },
  { key: "disableScrollBar", json: "disable_scroll_bar", label: "Disable Scroll Bar", kind: "boolean" },
  { key: "disableAnimations", json: "disable_animations", label: "Disable Animations", kind: "boolean" },
  { key: "autoLogin", json: "auto_login", label: "Auto Login", kind: "boolean" },
  { key: "showLineNumbers", json: "show_line_numbers", label: "Show Line Numbers", kind: "boolean" },
  { key: "enableMouseSupport", json: "enable_mouse_support", label: "Enable Mouse Support", kind: "boolean" },
  {
    key: "warningDelta",
    json: "warning_delta",
    label: "Number of Days to Warn Before Due Date",
    kind: "number",
    min: MIN_WARNING_DELTA,
    max: MAX_WARNING_DELTA,
  },
  { key: "tickrate", json: "tickrate", label: "Tickrate", kind: "number", min: MIN_TICKRATE, max: MAX_TICKRATE },
  {
    key: "cardsShown",
    json: "no_of_cards_to_show",
    label: "Number of Cards to Show",
    kind: "number",
    min: MIN_CARDS_SHOWN,
    max: MAX_CARDS_SHOWN,
  },
  {
    key: "boardsShown",
    json: "no_of_boards_to_show",
    label: "Number of Boards to Show",
    kind: "number",
    min: MIN_BOARDS_SHOWN,
    max: MAX_BOARDS_SHOWN,
  },
  {
    key: "datePickerCalendarFormat",
    json: "date_picker_calender_format",
    label: "Date Picker Calendar Format",
    kind: "calendarFormat",
  },
  { key: "defaultTheme", json: "default_theme", label: "Default Theme", kind: "theme" },
  { key: "dateTimeFormat", json: "date_time_format", label: "Date Format", kind: "dateFormat" },
  { key: "keybindings", json: "keybindings", label: "Edit Keybindings", kind: "keybindings" },
];

export function configFieldByLabel(label: string): ConfigField | undefined {
  return CONFIG_FIELDS.find((f) => f.label === label);
}

export function configValueAsString(config: AppConfig, field: ConfigField): string {
  switch (field.kind) {
    case "path":
      return config.saveDirectory;
    case "view":
      return viewLabel(config.defaultView);
    case "boolean":
      return String(config[field.key]);
    case "number":
      return String(config[field.key]);
    case "theme":
      return config.defaultTheme;
    case "dateFormat":
      return humanReadableFormat(config.dateTimeFormat);
    case "calendarFormat":
      return config.datePickerCalendarFormat;
    case "keybindings":
      return "";
  }
}

/** Rows for the config table: label and current value. */
export function configRows(config: AppConfig): Array<[string, string]> {
  return CONFIG_FIELDS.map((f): [string, string] => [f.label, configValueAsString(config, f)]);
}

export function configToJson(config: AppConfig): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const field of CONFIG_FIELDS) {
    switch (field.kind) {
      case "keybindings":
        out[field.json] = serializeKeyBindings(config.keybindings);
        break;
      case "view":
        out[field.json] = config.defaultView;
        break;
      case "dateFormat":
        out[field.json] = config.dateTimeFormat;
        break;
      case "calendarFormat":
        out[field.json] = config.datePickerCalendarFormat;
        break;
      case "path":
        out[field.json] = config.saveDirectory;
        break;
      case "theme":
        out[field.json] = config.defaultTheme;
        break;
      case "boolean":
        out[field.json] = config[field.key];
        break;
      case "number":
        out[field.json] = config[field.key];
        break;
    }
  }
  return out;
}

export interface ConfigParse {
  config: AppConfig;
  warnings: string[];
  errors: string[];
}

/** Lenient: each invalid field falls back to its default with a warning. */
export function configFromJson(raw: unknown, env: NodeJS.ProcessEnv = process.env): ConfigParse {
  const defaults = defaultConfig(env);
  const config: AppConfig = { ...defaults };
  const warnings: string[] = [];
  const errors: string[] = [];
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    errors.push("Config file is not a JSON object, using default config");
    return { config, warnings, errors };
  }
  const obj = new Map(Object.entries(raw));
  const fallback = (field: ConfigField, value: unknown): void => {
    warnings.push(`Invalid value for ${field.json}: ${JSON.stringify(value)}, using default`);
  };

  for (const field of CONFIG_FIELDS) {
    if (!obj.has(field.json)) {
      if (field.kind !== "keybindings") warnings.push(`Missing ${field.json} in config, using default`);
      continue;
    }
    const value = obj.get(field.json);
    switch (field.kind) {
      case "path":
        if (typeof value === "string" && value.trim()) config.saveDirectory = value;
        else fallback(field, value);
        break;
      case "view":
        if (isView(value)) config.defaultView = value;
        else fallback(field, value);
        break;
      case "boolean":
        if (typeof value === "boolean") config[field.key] = value;
        else fallback(field, value);
        break;
      case "number":
        if (typeof value === "number" && Number.isInteger(value) && value >= field.min && value <= field.max) {
          config[field.key] = value;
        } else fallback(field, value);
        break;
      case "theme":
        if (typeof value === "string" && value.trim()) config.defaultTheme = value;
        else fallback(field, value);
        break;
      case "dateFormat":
        if (isDateTimeFormat(value)) config.dateTimeFormat = value;
        else fallback(field, value);
        break;
      case "calendarFormat":
        if (isCalendarFormat(value)) config.datePickerCalendarFormat = value;
        else fallback(field, value);
        break;
      case "keybindings": {
        const parsed = parseKeyBindings(value);
        if (parsed.ok) {
          config.keybindings = parsed.bindings;
          warnings.push(...parsed.warnings);
        } else {
          errors.push(`${parsed.error}, using default keybindings`);
        }
        break;
      }
    }
  }
  return { config, warnings, errors };
}

export interface LoadConfigResult extends ConfigParse {
  path: string;
  /** True when the file was missing or unreadable and defaults were written back. */
  wroteDefaults: boolean;
}

export async function writeConfig(configDir: string, config: AppConfig): Promise<void> {
  await writeJsonAtomic(getConfigPath(configDir), configToJson(config));
}

export async function loadConfig(args: { configDir: string; env?: NodeJS.ProcessEnv }): Promise<LoadConfigResult> {
  const env = args.env ?? process.env;
  const configPath = getConfigPath(args.configDir);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") throw error;
    const config = defaultConfig(env);
    await writeConfig(args.configDir, config);
    return { config, warnings: [], errors: [], path: configPath, wroteDefaults: true };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const config = defaultConfig(env);
    await writeConfig(args.configDir, config);
    return {
      config,
      warnings: [],
      errors: [`Could not parse config file ${configPath}: ${errorMessage(error)}, using default config`],
      path: configPath,
      wroteDefaults: true,
    };
  }
  return { ...configFromJson(parsed, env), path: configPath, wroteDefaults: false };
}

export async function resetConfig(args: { configDir: string; env?: NodeJS.ProcessEnv }): Promise<AppConfig> {
  const config = defaultConfig(args.env ?? process.env);
  await writeConfig(args.configDir, config);
  return config;
}

export type ConfigEdit = { ok: true; config: AppConfig } | { ok: false; error: string };

/** Validates a text value for `field` and returns an updated copy. */
export async function editConfigValue(config: AppConfig, field: ConfigField, rawValue: string): Promise<ConfigEdit> {
  const value = rawValue.trim();
  const next: AppConfig = { ...config };
  switch (field.kind) {
    case "path": {
      const ok = await fs
        .stat(value)
        .then((s) => s.isDirectory())
        .catch(() => false);
      if (!value || !ok) return { ok: false, error: `Invalid path: ${value}` };
      next.saveDirectory = value;
      return { ok: true, config: next };
    }
    case "view": {
      const view = viewFromLabel(value) ?? (isView(value) ? value : undefined);
      if (!view) return { ok: false, error: `Invalid View: ${value}` };
      next.defaultView = view;
      return { ok: true, config: next };
    }
    case "boolean":
      if (value !== "true" && value !== "false") return { ok: false, error: `Invalid boolean: ${value}` };
      next[field.key] = value === "true";
      return { ok: true, config: next };
    case "number": {
      const n = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
      if (Number.isNaN(n) || n < field.min || n > field.max) {
        return { ok: false, error: `Invalid value for ${field.label}: must be between ${field.min} and ${field.max}` };
      }
      next[field.key] = n;
      return { ok: true, config: next };
    }
    case "theme":
      if (!value) return { ok: false, error: "Invalid theme name" };
      next.defaultTheme = value;
      return { ok: true, config: next };
    case "dateFormat": {
      const format = formatFromHumanReadable(value) ?? (isDateTimeFormat(value) ? value : undefined);
      if (!format) return { ok: false, error: `Invalid DateFormat: ${value}` };
      next.dateTimeFormat = format;
      return { ok: true, config: next };
    }
    case "calendarFormat":
      if (!isCalendarFormat(value)) return { ok: false, error: `Invalid calendar format: ${value}` };
      next.datePickerCalendarFormat = value;
      return { ok: true, config: next };
    case "keybindings":
      return { ok: false, error: "Keybindings are edited in the keybinding editor" };
  }
}

export function toggleConfigValue(config: AppConfig, key: BooleanConfigKey): AppConfig {
  const next = { ...config };
  next[key] = !next[key];
  return next;
}
