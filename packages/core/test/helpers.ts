import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { App } from "../src/app";
import { CloudClient } from "../src/cloud";
import { defaultConfig, type AppConfig } from "../src/config";
import { handleKey } from "../src/dispatcher";
import { IoHandler } from "../src/io-handler";
import { key, parseKey } from "../src/keys";
import { Mutex } from "../src/mutex";
import { FAKE_CLOUD_URL, type FakeCloud } from "./fake-cloud";

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "kanban-test-"));
}

export interface Harness {
  app: App;
  io: IoHandler;
}

/** An app rooted at `dir` with an I/O handler that tests drain by hand through `flush`. */
export function harness(args: {
  dir: string;
  cloud?: FakeCloud;
  config?: Partial<AppConfig>;
  now?: () => number;
}): Harness {
  const env: NodeJS.ProcessEnv = { KANBAN_CONFIG_DIR: args.dir };
  const config = { ...defaultConfig(env), ...args.config };
  const app = new App({ config, configDir: args.dir, env, now: args.now });
  const cloud = args.cloud
    ? new CloudClient({ baseUrl: FAKE_CLOUD_URL, anonKey: "test-anon-key", fetch: args.cloud.fetch })
    : undefined;
  return { app, io: new IoHandler({ app, mutex: new Mutex(), cloud }) };
}

/** Sends each key spec, e.g. `press(app, "b", "enter", "ctrl-s")`. */
export function press(app: App, ...specs: string[]): void {
  for (const spec of specs) {
    const parsed = parseKey(spec);
    if (!parsed) throw new Error(`bad key spec '${spec}'`);
    handleKey(app, parsed);
  }
}

/** Types `text` one character at a time. */
export function type(app: App, text: string): void {
  for (const ch of Array.from(text)) handleKey(app, key(ch === " " ? "space" : ch));
}

export function toastMessages(app: App): string[] {
  return app.toasts.all().map((t) => t.message);
}
