import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  CONFIG_FIELDS,
  configFromJson,
  configToJson,
  defaultConfig,
  editConfigValue,
  getConfigDir,
  loadConfig,
  resetConfig,
  toggleConfigValue,
  writeConfig,
  type ConfigField,
} from "../src/config";

function field(json: string): ConfigField {
  const found = CONFIG_FIELDS.find((f) => f.json === json);
  if (!found) throw new Error(`no field ${json}`);
  return found;
}

describe("config", () => {
  let dir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "kanban-config-"));
    env = { KANBAN_CONFIG_DIR: dir };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("resolves directories from the environment", () => {
    expect(getConfigDir({ XDG_CONFIG_HOME: "/xdg" })).toBe(path.join("/xdg", "tui-kanban"));
    expect(getConfigDir(env)).toBe(path.resolve(dir));
    expect(defaultConfig(env).saveDirectory).toBe(path.join(path.resolve(dir), "saves"));
  });

  it("writes defaults when the file is missing", async () => {
    const loaded = await loadConfig({ configDir: dir, env });
    expect(loaded.wroteDefaults).toBe(true);
    expect(loaded.config).toEqual(defaultConfig(env));
    const written = JSON.parse(await fs.readFile(path.join(dir, "config.json"), "utf8"));
    expect(written.tickrate).toBe(50);
    expect(written.keybindings.quit).toEqual(["ctrl-c", "q"]);
  });

  it("reads back what it writes without warnings", async () => {
    const config = { ...defaultConfig(env), tickrate: 120, autoSave: false, defaultView: "TitleBody" as const };
    await writeConfig(dir, config);
    const loaded = await loadConfig({ configDir: dir, env });
    expect(loaded.wroteDefaults).toBe(false);
    expect(loaded.warnings).toEqual([]);
    expect(loaded.errors).toEqual([]);
    expect(loaded.config).toEqual(config);
  });

  it("replaces an unparsable file with defaults and reports it", async () => {
    await fs.writeFile(path.join(dir, "config.json"), "{", "utf8");
    const loaded = await loadConfig({ configDir: dir, env });
    expect(loaded.wroteDefaults).toBe(true);
    expect(loaded.errors[0]).toMatch(/^Could not parse config file/);
  });

  it("falls back field by field", () => {
    const raw = { ...configToJson(defaultConfig(env)), tickrate: 5, auto_save: "yes" };
    const parsed = configFromJson(raw, env);
    expect(parsed.config.tickrate).toBe(50);
    expect(parsed.config.autoSave).toBe(true);
    expect(parsed.warnings).toEqual([
      'Invalid value for auto_save: "yes", using default',
      "Invalid value for tickrate: 5, using default",
    ]);
  });

  it("warns about every missing field except keybindings", () => {
    const parsed = configFromJson({}, env);
    expect(parsed.warnings).toHaveLength(CONFIG_FIELDS.length - 1);
    expect(parsed.warnings[0]).toBe("Missing save_directory in config, using default");
  });

  it("rejects a non-object document", () => {
    expect(configFromJson([], env).errors).toEqual(["Config file is not a JSON object, using default config"]);
  });

  it("reports overlapping keybindings as an error and keeps the defaults", () => {
    const raw = { ...configToJson(defaultConfig(env)), keybindings: { quit: ["n"] } };
    const parsed = configFromJson(raw, env);
    expect(parsed.errors).toEqual([
      "Overlapping keybindings: 'n' is bound to quit, new_card, using default keybindings",
    ]);
    expect(parsed.config.keybindings).toEqual(defaultConfig(env).keybindings);
  });

  it("validates edited values", async () => {
    const config = defaultConfig(env);
    expect(await editConfigValue(config, field("tickrate"), "5")).toEqual({
      ok: false,
      error: "Invalid value for Tickrate: must be between 10 and 1000",
    });
    const edited = await editConfigValue(config, field("tickrate"), " 100 ");
    expect(edited.ok && edited.config.tickrate).toBe(100);
    expect(await editConfigValue(config, field("auto_save"), "yes")).toEqual({ ok: false, error: "Invalid boolean: yes" });
    const format = await editConfigValue(config, field("date_time_format"), "MM/DD/YYYY");
    expect(format.ok && format.config.dateTimeFormat).toBe("MonthDayYear");
    expect(await editConfigValue(config, field("save_directory"), path.join(dir, "nope"))).toEqual({
      ok: false,
      error: `Invalid path: ${path.join(dir, "nope")}`,
    });
    const saveDir = await editConfigValue(config, field("save_directory"), dir);
    expect(saveDir.ok && saveDir.config.saveDirectory).toBe(dir);
  });

  it("reads the calendar week start and rejects unknown ones", async () => {
    const raw = { ...configToJson(defaultConfig(env)), date_picker_calender_format: "MondayFirst" };
    expect(configFromJson(raw, env).config.datePickerCalendarFormat).toBe("MondayFirst");
    const bad = configFromJson({ ...raw, date_picker_calender_format: "Tuesday" }, env);
    expect(bad.config.datePickerCalendarFormat).toBe("SundayFirst");
    expect(bad.warnings).toEqual(['Invalid value for date_picker_calender_format: "Tuesday", using default']);
    expect(await editConfigValue(defaultConfig(env), field("date_picker_calender_format"), "Weekly")).toEqual({
      ok: false,
      error: "Invalid calendar format: Weekly",
    });
  });

  it("toggles booleans without touching the original", () => {
    const config = defaultConfig(env);
    const toggled = toggleConfigValue(config, "autoSave");
    expect(toggled.autoSave).toBe(false);
    expect(config.autoSave).toBe(true);
  });

  it("resets to defaults", async () => {
    await writeConfig(dir, { ...defaultConfig(env), tickrate: 200 });
    await resetConfig({ configDir: dir, env });
    expect((await loadConfig({ configDir: dir, env })).config.tickrate).toBe(50);
  });
});
