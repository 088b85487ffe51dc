import process from "node:process";
import {
  CLOUD_NOT_CONFIGURED_MESSAGE,
  CloudClient,
  Logger,
  cloudEndpointFromEnv,
  encryptionKeyPath,
  errorMessage,
  fileExists,
  generateKey,
  getConfigDir,
  levelPrefix,
  resetConfig,
  saveEncryptionKey,
  type LogLevel,
  type LogSink,
} from "@tui-kanban/core";
import terminalKit from "terminal-kit";

export type CliOptions = {
  help: boolean;
  generateNewKey: boolean;
  resetConfig: boolean;
  encryptionKey?: string;
};

function isFlag(x: string): boolean {
  return x.startsWith("-");
}

function takeFlagValue(argv: string[], i: number): { value?: string; nextIndex: number } {
  const arg = argv[i] ?? "";
  const eqIdx = arg.indexOf("=");
  if (eqIdx !== -1) return { value: arg.slice(eqIdx + 1), nextIndex: i + 1 };
  const next = argv[i + 1];
  if (next && !isFlag(next)) return { value: next, nextIndex: i + 2 };
  return { value: undefined, nextIndex: i + 1 };
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { help: false, generateNewKey: false, resetConfig: false };
  for (let i = 0; i < argv.length; ) {
    const a = argv[i] ?? "";
    if (a === "--help" || a === "-h" || a === "help") {
      options.help = true;
      i += 1;
      continue;
    }
    if (a === "--generate-new-key" || a === "-g") {
      options.generateNewKey = true;
      i += 1;
      continue;
    }
    if (a === "--reset-config" || a === "-r") {
      options.resetConfig = true;
      i += 1;
      continue;
    }
    if (a === "--encryption-key" || a === "-e" || a.startsWith("--encryption-key=")) {
      const { value, nextIndex } = takeFlagValue(argv, i);
      if (!value) throw new Error("Missing required flag: --encryption-key <key>");
      options.encryptionKey = value;
      i = nextIndex;
      continue;
    }
    throw new Error(`Usage: unknown argument '${a}' (use --help)`);
  }
  return options;
}

/** The fullscreen UI runs unless a one-shot command was asked for. */
export function decideMode(options: CliOptions): "cli" | "tui" {
  return options.help || options.generateNewKey || options.resetConfig ? "cli" : "tui";
}

export function isUsageErrorMessage(message: string): boolean {
  return message.startsWith("Usage:") || message.startsWith("Missing required flag:");
}

export function usage(): string {
  return [
    "kanban - a terminal kanban board",
    "",
    "Usage:",
    "  kanban [flags]",
    "",
    "Flags:",
    "  -g, --generate-new-key     Log in, delete existing cloud saves and generate a new encryption key",
    "  -r, --reset-config         Reset the config file to its defaults",
    "  -e, --encryption-key <k>   Use this encryption key for this run instead of the key file",
    "  -h, --help                 Help",
    "",
    "Environment:",
    "  KANBAN_CONFIG_DIR          Config directory (default: $XDG_CONFIG_HOME/tui-kanban)",
    "  KANBAN_CLOUD_URL           Cloud sync endpoint",
    "  KANBAN_CLOUD_ANON_KEY      Cloud sync anon key",
    "",
  ].join("\n");
}

type CliTerminal = ReturnType<typeof terminalKit.createTerminal>;

function paintPrefix(term: CliTerminal, level: LogLevel): void {
  const prefix = levelPrefix(level);
  switch (level) {
    case "error":
      term.red(prefix);
      return;
    case "warn":
      term.yellow(prefix);
      return;
    case "info":
      term.green(prefix);
      return;
    case "debug":
      term.cyan(prefix);
      return;
  }
}

/** Colored `[LEVEL] - message` lines on stderr. */
export function stderrSink(): LogSink {
  const term = terminalKit.createTerminal({ stdout: process.stderr, stderr: process.stderr });
  return (entry) => {
    paintPrefix(term, entry.level);
    term(`${entry.message}\n`);
  };
}

export interface Prompter {
  confirm(question: string): Promise<boolean>;
  ask(question: string, options?: { secret?: boolean }): Promise<string>;
  close(): void;
}

export function terminalPrompter(): Prompter {
  const term = terminalKit.terminal;
  return {
    async confirm(question) {
      term(`${question} (y/n)\n> `);
      const answer = await term.yesOrNo({ yes: ["y", "Y"], no: ["n", "N", "ENTER"] }).promise;
      term("\n");
      return answer === true;
    },
    async ask(question, options = {}) {
      term(`${question}: `);
      const value = await term.inputField(options.secret ? { echoChar: "*" } : {}).promise;
      term("\n");
      return value ?? "";
    },
    close() {
      term.grabInput(false);
    },
  };
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  configDir?: string;
  logger?: Logger;
  prompter?: Prompter;
  cloud?: CloudClient;
}

/**
 * Replaces the encryption key. Existing cloud saves were encrypted with the
 * old key, so they are listed and deleted first after a confirmation.
 */
export async function generateNewKey(args: {
  configDir: string;
  logger: Logger;
  prompter: Prompter;
  cloud?: CloudClient;
}): Promise<number> {
  const { configDir, logger, prompter, cloud } = args;
  const keyPath = encryptionKeyPath(configDir);
  const previousKeyLost = !(await fileExists(keyPath));
  if (!previousKeyLost) {
    logger.info("An encryption key already exists, are you sure you want to generate a new one?");
    if (!(await prompter.confirm("Generate a new encryption key?"))) {
      logger.info("Aborting...");
      return 0;
    }
    logger.info("Preparing to generate new encryption key...");
  } else {
    logger.warn("Previous encryption key not found, preparing to generate new encryption key...");
  }

  if (!cloud) {
    logger.error(CLOUD_NOT_CONFIGURED_MESSAGE);
    return 1;
  }

  const email = (await prompter.ask("Email")).trim();
  const password = await prompter.ask("Password", { secret: true });
  if (!email || !password) {
    logger.error("Email and password are required");
    return 1;
  }

  logger.info("Trying to login...");
  let accessToken: string;
  let userId: string;
  try {
    accessToken = (await cloud.login(email, password)).accessToken;
    userId = await cloud.getUserId(accessToken);
  } catch (error) {
    logger.debug(`Error logging in: ${errorMessage(error)}`);
    logger.error("Error logging in");
    logger.error("Aborting...");
    return 1;
  }

  const saves = await cloud.listSaves(accessToken, userId);
  if (saves.length > 0) {
    logger.info(`${saves.length} save files found`);
    if (previousKeyLost) logger.warn("It seems like the previous encryption key was lost as it could not be found");
    logger.info("Cloud save files found:");
    saves.forEach((save, i) => {
      logger.info(`${i + 1}) cloud_save_${save.saveId} - Created at (UTC) ${save.createdAt}`);
    });
    logger.warn(`Answer 'n' to find the encryption key yourself and move it to ${keyPath}`);
    if (!(await prompter.confirm("Delete all the save files and generate a new encryption key?"))) {
      logger.info("Aborting...");
      return 0;
    }
    for (const save of saves) {
      logger.info(`Deleting save file: cloud_save_${save.saveId}`);
      try {
        await cloud.deleteSave(accessToken, save.id);
      } catch (error) {
        logger.debug(`Error: ${errorMessage(error)}`);
        logger.error("Error deleting save file");
        logger.error("Aborting...");
        return 1;
      }
    }
    logger.info("All save files deleted");
  } else {
    logger.warn("No Cloud save files found");
  }

  logger.info("Generating new encryption key...");
  const savedAt = await saveEncryptionKey(configDir, generateKey());
  logger.info("Encryption key generated and saved");
  logger.info("Please keep this key safe as it will be required to access your save files");
  logger.info(`New Key generated at: ${savedAt}`);
  return 0;
}

export async function runCli(rawArgv: string[], deps: CliDeps = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(rawArgv);
  } catch (error) {
    process.stderr.write(`${errorMessage(error)}\n\n${usage()}`);
    return 2;
  }
  if (options.help) {
    process.stdout.write(usage());
    return 0;
  }

  const env = deps.env ?? process.env;
  const configDir = deps.configDir ?? getConfigDir(env);
  let logger = deps.logger;
  if (!logger) {
    logger = new Logger();
    logger.addSink(stderrSink());
  }

  try {
    if (options.resetConfig) {
      logger.info("🚀 Resetting config");
      await resetConfig({ configDir, env });
      logger.info("👍 Config reset");
    }
    if (options.generateNewKey) {
      const endpoint = cloudEndpointFromEnv(env);
      const cloud = deps.cloud ?? (endpoint ? new CloudClient(endpoint) : undefined);
      const prompter = deps.prompter ?? terminalPrompter();
      try {
        return await generateNewKey({ configDir, logger, prompter, cloud });
      } finally {
        prompter.close();
      }
    }
    return 0;
  } catch (error) {
    const message = errorMessage(error);
    logger.error(message);
    return isUsageErrorMessage(message) ? 2 : 1;
  }
}
