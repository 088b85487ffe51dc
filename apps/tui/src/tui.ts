import path from "node:path";
import process from "node:process";
import {
  App,
  IoHandler,
  LOG_FILE_NAME,
  Logger,
  Mutex,
  createFileSink,
  defaultConfig,
  errorMessage,
  getConfigDir,
  handleKey,
  handleMouse,
  loadConfig,
  type AppConfig,
} from "@tui-kanban/core";
import terminalKit from "terminal-kit";
import { Frame } from "./frame";
import { keyFromTerminal, mouseFromTerminal, type TerminalMouseData } from "./input";
import { paintFrame } from "./paint";
import { render } from "./render";

export const AUTO_SAVE_INTERVAL_MS = 60_000;

export interface TuiOptions {
  /** Overrides the key file for this run. */
  encryptionKey?: string;
  env?: NodeJS.ProcessEnv;
}

async function loadStartupConfig(
  configDir: string,
  env: NodeJS.ProcessEnv,
): Promise<{ config: AppConfig; warnings: string[]; errors: string[] }> {
  try {
    const loaded = await loadConfig({ configDir, env });
    return { config: loaded.config, warnings: loaded.warnings, errors: loaded.errors };
  } catch (error) {
    return {
      config: defaultConfig(env),
      warnings: [],
      errors: [`Cannot read or write config in ${configDir}, using defaults: ${errorMessage(error)}`],
    };
  }
}

/**
 * Runs the fullscreen board until the user quits. Input, ticks and renders
 * are serialized through one chain under the app mutex; I/O events run on
 * their own task against the same lock.
 */
export async function runTui(options: TuiOptions = {}): Promise<void> {
  const env = options.env ?? process.env;
  const configDir = getConfigDir(env);
  const logger = new Logger();

  let closeLog: (() => Promise<void>) | undefined;
  const startupErrors: string[] = [];
  try {
    const file = createFileSink(path.join(configDir, LOG_FILE_NAME));
    logger.addSink(file.sink);
    closeLog = file.close;
  } catch (error) {
    startupErrors.push(`Cannot open log file: ${errorMessage(error)}`);
  }

  const loaded = await loadStartupConfig(configDir, env);
  const app = new App({ config: loaded.config, configDir, logger, env, encryptionKey: options.encryptionKey });
  for (const message of [...startupErrors, ...loaded.errors]) app.error(message);
  for (const message of loaded.warnings) app.warn(message);

  const mutex = new Mutex();
  const io = new IoHandler({ app, mutex });
  const ioTask = io.run();
  app.dispatch({ type: "Initialize" });

  const term = terminalKit.terminal;
  let previous: Frame | undefined;
  let mouseEnabled = app.config.enableMouseSupport;

  const draw = () => {
    const width = term.width ?? process.stdout.columns ?? 80;
    const height = term.height ?? process.stdout.rows ?? 24;
    const frame = new Frame(width, height, app.theme.styles.general_style);
    render(app, frame);
    paintFrame(term, frame, previous);
    previous = frame;
  };

  let resolveQuit: () => void = () => undefined;
  const quit = new Promise<void>((resolve) => {
    resolveQuit = resolve;
  });

  let chain: Promise<void> = Promise.resolve();
  const enqueue = (fn: () => void) => {
    chain = chain
      .then(() =>
        mutex.runExclusive(() => {
          if (app.shouldQuit) return;
          fn();
          if (app.shouldQuit) resolveQuit();
        }),
      )
      .catch((error: unknown) => {
        logger.error(`UI loop: ${errorMessage(error)}`);
      });
  };

  const onKey = (name: string, _matches: string[], data: { isCharacter?: boolean }) => {
    const key = keyFromTerminal(name, data.isCharacter === true);
    if (!key) return;
    enqueue(() => {
      handleKey(app, key);
      draw();
    });
  };

  const onMouse = (name: string, data: TerminalMouseData) => {
    const event = mouseFromTerminal(name, data);
    if (!event) return;
    enqueue(() => {
      handleMouse(app, event);
      draw();
    });
  };

  const onResize = () => {
    previous = undefined;
    enqueue(() => {
      app.refreshVisible();
      draw();
    });
  };

  let tickRate = app.config.tickrate;
  const tick = () => {
    enqueue(() => {
      app.toasts.prune();
      if (app.config.enableMouseSupport !== mouseEnabled) {
        mouseEnabled = app.config.enableMouseSupport;
        term.grabInput(mouseEnabled ? { mouse: "motion" } : true);
      }
      if (app.config.tickrate !== tickRate) {
        tickRate = app.config.tickrate;
        clearInterval(ticker);
        ticker = setInterval(tick, tickRate);
      }
      draw();
    });
  };
  let ticker = setInterval(tick, tickRate);
  const autoSaver = setInterval(() => {
    enqueue(() => {
      if (app.config.autoSave) app.dispatch({ type: "AutoSave" });
    });
  }, AUTO_SAVE_INTERVAL_MS);

  term.fullscreen(true);
  term.hideCursor();
  term.grabInput(mouseEnabled ? { mouse: "motion" } : true);
  term.on("key", onKey);
  term.on("mouse", onMouse);
  process.stdout.on("resize", onResize);
  enqueue(draw);

  try {
    await quit;
  } finally {
    clearInterval(ticker);
    clearInterval(autoSaver);
    term.removeListener("key", onKey);
    term.removeListener("mouse", onMouse);
    process.stdout.removeListener("resize", onResize);
    await chain;
    app.io.close();
    await ioTask;
    term.grabInput(false);
    term.hideCursor(false);
    term.styleReset();
    term.fullscreen(false);
    logger.info("👋 Exiting");
    if (closeLog) await closeLog();
  }
}
