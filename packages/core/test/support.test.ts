import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { Logger, createFileSink, formatLogEntry } from "../src/logger";
import { Mutex } from "../src/mutex";
import { AsyncQueue } from "../src/queue";
import {
  builtInThemes,
  cycleColor,
  defaultTheme,
  hexToRgb,
  loadCustomThemes,
  mergeThemes,
  parseTheme,
  saveCustomTheme,
  themeFileName,
  toggleModifier,
} from "../src/themes";
import { MAX_VISIBLE_TOASTS, ToastQueue } from "../src/toast";
import { tempDir } from "./helpers";

describe("AsyncQueue", () => {
  it("hands items to a waiting consumer and ends after close", async () => {
    const queue = new AsyncQueue<number>();
    const first = queue.next();
    queue.push(1);
    queue.push(2);
    expect(await first).toBe(1);
    expect(queue.size).toBe(1);
    queue.close();
    queue.push(3);
    expect(await queue.next()).toBe(2);
    expect(await queue.next()).toBeUndefined();
  });
});

describe("Mutex", () => {
  it("runs critical sections one at a time in call order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const a = mutex.runExclusive(async () => {
      order.push("a start");
      await gate;
      order.push("a end");
    });
    const b = mutex.runExclusive(() => {
      order.push("b");
    });
    await Promise.resolve();
    expect(mutex.isLocked).toBe(true);
    release();
    await Promise.all([a, b]);

    expect(order).toEqual(["a start", "a end", "b"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("releases the lock when the section throws", async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(mutex.isLocked).toBe(false);
  });
});

describe("ToastQueue", () => {
  it("expires toasts after their duration, errors staying longer", () => {
    let now = 0;
    const toasts = new ToastQueue(() => now);
    toasts.info("saved");
    toasts.error("failed");
    now = 6_000;
    toasts.prune();
    expect(toasts.all().map((t) => t.message)).toEqual(["failed"]);
    now = 10_000;
    toasts.prune();
    expect(toasts.all()).toEqual([]);
  });

  it("shows the newest toasts first", () => {
    const toasts = new ToastQueue(() => 0);
    for (let i = 1; i <= MAX_VISIBLE_TOASTS + 2; i++) toasts.info(`t${i}`);
    expect(toasts.visible().map((t) => t.message)).toEqual(["t7", "t6", "t5", "t4", "t3"]);
  });
});

describe("Logger", () => {
  it("drops entries below its level and keeps a bounded buffer", () => {
    const logger = new Logger({ capacity: 2 });
    const seen: string[] = [];
    const remove = logger.addSink((e) => seen.push(e.message));
    logger.debug("hidden");
    logger.info("one");
    logger.warn("two");
    logger.error("three");
    expect(logger.entries().map((e) => e.message)).toEqual(["two", "three"]);
    expect(seen).toEqual(["one", "two", "three"]);

    remove();
    logger.setLevel("debug");
    logger.debug("shown");
    expect(seen).toHaveLength(3);
    expect(logger.entries().map((e) => e.level)).toEqual(["error", "debug"]);
  });

  it("formats lines with a timestamp and level prefix", () => {
    const line = formatLogEntry({ level: "warn", message: "careful", ts: new Date(Date.UTC(2030, 0, 2, 3, 4, 5)) });
    expect(line).toBe("2030-01-02T03:04:05.000Z [WARN]  - careful");
  });

  it("appends to a log file", async () => {
    const dir = await tempDir();
    try {
      const filePath = path.join(dir, "logs", "kanban.log");
      const logger = new Logger();
      const file = createFileSink(filePath);
      logger.addSink(file.sink);
      logger.info("hello");
      await file.close();
      expect(await fs.readFile(filePath, "utf8")).toMatch(/^\S+ \[INFO\]  - hello\n$/);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("themes", () => {
  it("ships the built-in themes with Default among them", () => {
    expect(builtInThemes().map((t) => t.name)).toEqual([
      "Cyberpunk",
      "Default",
      "Dracula",
      "Light",
      "Matrix",
      "Metro",
      "Midnight Blue",
      "Slate",
    ]);
    expect(defaultTheme().name).toBe("Default");
  });

  it("rejects a theme with an unknown color", () => {
    const theme = defaultTheme();
    const raw = { name: "Odd", styles: { ...theme.styles, general_style: { fg: "chartreuse", modifiers: [] } } };
    expect(parseTheme(raw)).toBeUndefined();
    expect(parseTheme({ name: " ", styles: theme.styles })).toBeUndefined();
  });

  it("converts hex colors and cycles through the named ones", () => {
    expect(hexToRgb("#ff8000")).toEqual({ r: 255, g: 128, b: 0 });
    expect(hexToRgb("orange")).toBeUndefined();
    expect(cycleColor(undefined, 1)).toBe("black");
    expect(cycleColor(undefined, -1)).toBe("white");
    expect(cycleColor("white", 1)).toBeUndefined();
  });

  it("toggles style modifiers", () => {
    const bold = toggleModifier({ modifiers: [] }, "bold");
    expect(bold.modifiers).toEqual(["bold"]);
    expect(toggleModifier(bold, "bold").modifiers).toEqual([]);
  });

  it("saves custom themes and lets them replace a built-in of the same name", async () => {
    const dir = await tempDir();
    try {
      const themesDir = path.join(dir, "themes");
      const custom = { ...defaultTheme(), name: "Night Owl!" };
      expect(themeFileName(custom.name)).toBe("Night_Owl.json");
      await saveCustomTheme(themesDir, custom);
      await saveCustomTheme(themesDir, { ...defaultTheme(), name: "Slate" });
      await fs.writeFile(path.join(themesDir, "broken.json"), "{}", "utf8");

      const loaded = await loadCustomThemes(themesDir);
      expect(loaded.themes.map((t) => t.name)).toEqual(["Night Owl!", "Slate"]);
      expect(loaded.errors).toEqual([`Invalid theme file: ${path.join(themesDir, "broken.json")}`]);

      const merged = mergeThemes(builtInThemes(), loaded.themes).map((t) => t.name);
      expect(merged.filter((n) => n === "Slate")).toHaveLength(1);
      expect(merged.slice(-2)).toEqual(["Night Owl!", "Slate"]);
      expect(await loadCustomThemes(path.join(dir, "missing"))).toEqual({ themes: [], errors: [] });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
