#!/usr/bin/env node
import process from "node:process";
import { errorMessage } from "@tui-kanban/core";
import { decideMode, isUsageErrorMessage, parseCliArgs, runCli, usage, type CliOptions } from "./cli";
import { runTui } from "./tui";

function writeStderr(text: string): Promise<void> {
  return new Promise((resolve) => {
    process.stderr.write(text, () => resolve());
  });
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    await writeStderr(`${errorMessage(err)}\n\n${usage()}`);
    return 2;
  }

  if (decideMode(options) === "cli") {
    return await runCli(argv);
  }

  try {
    await runTui({ encryptionKey: options.encryptionKey });
    return 0;
  } catch (err) {
    const message = errorMessage(err);
    await writeStderr(`${message}\n`);
    return isUsageErrorMessage(message) ? 2 : 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    process.stderr.write(`${errorMessage(err)}\n`);
    process.exitCode = 1;
  });
