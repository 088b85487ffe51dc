import fs from "node:fs/promises";
import type { App, UserSession } from "./app";
import { ApiError, CloudClient, RATE_LIMIT_MESSAGE, cloudEndpointFromEnv, nextSaveId, type FetchLike } from "./cloud";
import { CONFIG_FIELDS, editConfigValue, getThemesDir, writeConfig } from "./config";
import {
  decryptBoards,
  encryptBoards,
  generateKey,
  readEncryptionKey,
  readRefreshToken,
  refreshTokenPath,
  saveEncryptionKey,
  saveRefreshToken,
} from "./crypto";
import { GENERIC_ERROR_MESSAGE, IntegrityError, KEY_RECOVERY_HINT, errorMessage } from "./errors";
import { removeIfExists } from "./files";
import type { IoEvent } from "./io-events";
import { cloneBoards, type Board } from "./model";
import type { Mutex } from "./mutex";
import { resetLinkWaitSeconds, validateNewPassword } from "./password";
import {
  deleteSaveFile,
  exportBoards,
  latestSaveFile,
  listSaveFiles,
  loadSaveFile,
  saveBoardsLocally,
  saveRequired,
} from "./persistence";
import { buildProjection } from "./projection";
import { loadCustomThemes, mergeThemes, saveCustomTheme, type Theme } from "./themes";

export const CLOUD_NOT_CONFIGURED_MESSAGE =
  "Cloud sync is not configured, set KANBAN_CLOUD_URL and KANBAN_CLOUD_ANON_KEY";
export const TOKEN_EXPIRED_MESSAGE = "Previous access token has expired or does not exist. Please login again";
export const KEY_SAFETY_WARNING =
  "Please keep this key safe, you will need it to decrypt your data, you will not be able to recover your data without it";

export interface IoHandlerOptions {
  app: App;
  mutex: Mutex;
  /** Defaults to a client for the endpoint in the app's environment, when one is configured. */
  cloud?: CloudClient;
  fetch?: FetchLike;
}

/** Toast text for a failed cloud call: the rate-limit explanation, or the operation's own wording. */
function cloudFailure(error: unknown, fallback: string): string {
  return error instanceof ApiError && error.kind === "rate-limit" ? RATE_LIMIT_MESSAGE : fallback;
}

/**
 * Performs I/O events one at a time. State is read and written under the
 * app mutex; file and network work runs with the lock released.
 */
export class IoHandler {
  private readonly app: App;
  private readonly mutex: Mutex;
  private readonly cloud?: CloudClient;

  constructor(options: IoHandlerOptions) {
    this.app = options.app;
    this.mutex = options.mutex;
    const endpoint = cloudEndpointFromEnv(options.app.env);
    this.cloud = options.cloud ?? (endpoint ? new CloudClient({ ...endpoint, fetch: options.fetch }) : undefined);
  }

  private locked<T>(fn: (app: App) => T): Promise<T> {
    return this.mutex.runExclusive(() => fn(this.app));
  }

  /** Consumes the app's I/O queue until it is closed. */
  async run(): Promise<void> {
    for (;;) {
      const event = await this.app.io.next();
      if (!event) return;
      await this.handle(event);
    }
  }

  /** Handles everything queued, including events queued while handling. */
  async flush(): Promise<void> {
    for (let events = this.app.io.drain(); events.length > 0; events = this.app.io.drain()) {
      for (const event of events) await this.handle(event);
    }
  }

  async handle(event: IoEvent): Promise<void> {
    try {
      await this.perform(event);
    } catch (error) {
      await this.locked((app) => {
        app.logger.error(`${GENERIC_ERROR_MESSAGE}: ${errorMessage(error)}`);
        app.toasts.error(GENERIC_ERROR_MESSAGE);
      });
    } finally {
      await this.locked((app) => {
        app.loading = app.io.size > 0;
      });
    }
  }

  private perform(event: IoEvent): Promise<void> {
    switch (event.type) {
      case "Initialize":
        return this.initialize();
      case "SaveLocalData":
        return this.saveLocalData(false);
      case "AutoSave":
        return this.saveLocalData(true);
      case "LoadSaveLocal":
        return this.loadSaveLocal();
      case "DeleteLocalSave":
        return this.deleteLocalSave();
      case "LoadLocalPreview":
        return this.loadLocalPreview();
      case "ExportToJson":
        return this.exportToJson();
      case "Login":
        return this.login(event.email, event.password);
      case "Logout":
        return this.logout();
      case "SignUp":
        return this.signUp(event.email, event.password, event.confirmPassword);
      case "SendResetPasswordEmail":
        return this.sendResetPasswordEmail(event.email);
      case "ResetPassword":
        return this.resetPassword(event.resetLink, event.password, event.confirmPassword);
      case "SyncLocalData":
        return this.syncLocalData();
      case "GetCloudData":
        return this.getCloudData();
      case "LoadSaveCloud":
        return this.loadCloudSave(false);
      case "LoadCloudPreview":
        return this.loadCloudSave(true);
      case "DeleteCloudSave":
        return this.deleteCloudSave();
      case "SaveConfig":
        return this.saveConfig(event.message);
      case "UpdateConfig":
        return this.updateConfig(event.field, event.value);
      case "SaveTheme":
        return this.saveTheme(event.theme, event.setDefault);
    }
  }

  private async initialize(): Promise<void> {
    const { configDir, saveDir, alwaysLoad, autoLogin } = await this.locked((app) => {
      app.logger.info("🚀 Initialize the application");
      return {
        configDir: app.configDir,
        saveDir: app.config.saveDirectory,
        alwaysLoad: app.config.alwaysLoadLastSave,
        autoLogin: app.config.autoLogin,
      };
    });

    const dirErrors: string[] = [];
    await fs.mkdir(configDir, { recursive: true }).catch(() => dirErrors.push("Cannot create config directory"));
    await fs.mkdir(saveDir, { recursive: true }).catch(() => dirErrors.push("Cannot create save directory"));
    const custom = await loadCustomThemes(getThemesDir(configDir));

    await this.locked((app) => {
      for (const message of dirErrors) app.error(message);
      for (const message of custom.errors) app.logger.warn(message);
      app.themes = mergeThemes(app.themes, custom.themes);
      app.theme = app.themes.find((t) => t.name === app.config.defaultTheme) ?? app.theme;
      app.setView(app.config.defaultView);
      app.logger.info("👍 Application initialized");
      app.toasts.info("Application initialized");
    });

    if (alwaysLoad) await this.loadLatestSave(saveDir);
    if (autoLogin) await this.autoLogin(configDir);
  }

  private async loadLatestSave(saveDir: string): Promise<void> {
    const latest = await latestSaveFile(saveDir);
    if (!latest) return;
    let boards: Board[];
    try {
      boards = await loadSaveFile(saveDir, latest.fileName);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error("👎 Cannot get local data, Data might be corrupted or is not in the correct format");
      });
      return;
    }
    await this.locked((app) => {
      app.setBoards(boards);
      app.history.reset();
      app.info(`👍 Local data loaded from "${latest.fileName}"`);
    });
  }

  private async autoLogin(configDir: string): Promise<void> {
    const cloud = this.cloud;
    if (!cloud) {
      await this.locked((app) => app.logger.debug("Skipping auto login: cloud sync is not configured"));
      return;
    }
    const fromArgs = await this.locked((app) => {
      app.toasts.info("Attempting to auto login");
      return app.encryptionKey;
    });
    try {
      const key = await readEncryptionKey({ configDir, fromArgs });
      const stored = await readRefreshToken({ configDir, key });
      if (!stored) {
        await this.locked((app) => app.warn(TOKEN_EXPIRED_MESSAGE));
        return;
      }
      const tokens = await cloud.refresh(stored.refreshToken);
      const userId = await cloud.getUserId(tokens.accessToken);
      await saveRefreshToken({ configDir, key, token: { refreshToken: tokens.refreshToken, email: stored.email } });
      await this.locked((app) => {
        app.session = { ...tokens, email: stored.email, userId };
        app.info("👍 Auto login successful");
      });
    } catch (error) {
      let removeFailure: string | undefined;
      await removeIfExists(refreshTokenPath(configDir)).catch((removeError: unknown) => {
        removeFailure = errorMessage(removeError);
      });
      await this.locked((app) => {
        app.logger.debug(`Auto login failed: ${errorMessage(error)}`);
        if (removeFailure) app.error(`Cannot delete refresh token file: ${removeFailure}`);
        app.warn(error instanceof IntegrityError ? `${errorMessage(error)}. ${KEY_RECOVERY_HINT}` : TOKEN_EXPIRED_MESSAGE);
      });
    }
  }

  private async saveLocalData(auto: boolean): Promise<void> {
    const { saveDir, boards, now } = await this.locked((app) => {
      if (!auto) app.logger.info("🚀 Saving local data");
      return { saveDir: app.config.saveDirectory, boards: cloneBoards(app.boards), now: app.date() };
    });
    if (!(await saveRequired(saveDir, boards))) {
      await this.locked((app) => {
        if (auto) app.logger.debug("Auto save skipped, no changes");
        else app.warn("No changes to save");
      });
      return;
    }
    try {
      const fileName = await saveBoardsLocally({ saveDir, boards, now });
      await this.locked((app) => {
        if (auto) app.logger.info(`👍 Auto saved to ${fileName}`);
        else app.info("👍 Local data saved");
      });
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error("Cannot save local data");
      });
    }
  }

  private async loadSaveLocal(): Promise<void> {
    const { saveDir, index } = await this.locked((app) => ({ saveDir: app.config.saveDirectory, index: app.lists.loadSave }));
    const file = (await listSaveFiles(saveDir))[index];
    if (!file) {
      await this.locked((app) => app.error("Cannot load save file: No such file"));
      return;
    }
    let boards: Board[];
    try {
      boards = await loadSaveFile(saveDir, file.fileName);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error("Cannot load save file");
      });
      return;
    }
    await this.locked((app) => {
      app.setBoards(boards);
      app.history.reset();
      app.preview = undefined;
      app.setView(app.config.defaultView);
      app.info(`👍 Save file "${file.fileName}" loaded`);
    });
  }

  private async deleteLocalSave(): Promise<void> {
    const { saveDir, index } = await this.locked((app) => ({ saveDir: app.config.saveDirectory, index: app.lists.loadSave }));
    const files = await listSaveFiles(saveDir);
    const file = files[index];
    if (!file) {
      await this.locked((app) =>
        app.error(files.length === 0 ? "Cannot delete save file: no save files found" : "Cannot delete save file: no save file selected"),
      );
      return;
    }
    const deleted = await deleteSaveFile(saveDir, file.fileName);
    await this.locked((app) => {
      if (!deleted) {
        app.error("Cannot delete save file: file not found");
        return;
      }
      app.logger.info(`🚀 Deleted save file: ${file.fileName}`);
      app.toasts.info("👍 Save file deleted");
      app.localSaves = files.filter((f) => f.fileName !== file.fileName);
      app.lists.loadSave = Math.max(0, Math.min(app.lists.loadSave, app.localSaves.length - 1));
      app.preview = undefined;
      if (app.localSaves.length > 0) app.dispatch({ type: "LoadLocalPreview" });
    });
  }

  private async loadLocalPreview(): Promise<void> {
    const saveDir = await this.locked((app) => app.config.saveDirectory);
    const files = await listSaveFiles(saveDir);
    const index = await this.locked((app) => {
      app.localSaves = files;
      app.lists.loadSave = Math.max(0, Math.min(app.lists.loadSave, files.length - 1));
      if (files.length === 0) app.preview = undefined;
      return app.lists.loadSave;
    });
    const file = files[index];
    if (!file) return;
    try {
      const boards = await loadSaveFile(saveDir, file.fileName);
      await this.locked((app) => {
        app.preview = { name: file.fileName, boards, state: buildProjection(boards, app.windowSize) };
      });
    } catch (error) {
      await this.locked((app) => {
        app.preview = undefined;
        app.logger.error(`Error loading preview: ${errorMessage(error)}`);
        app.toasts.error("Error loading preview");
      });
    }
  }

  private async exportToJson(): Promise<void> {
    const { saveDir, boards, now } = await this.locked((app) => ({
      saveDir: app.config.saveDirectory,
      boards: cloneBoards(app.boards),
      now: app.date(),
    }));
    await fs.mkdir(saveDir, { recursive: true });
    const filePath = await exportBoards({ saveDir, boards, now });
    await this.locked((app) => app.info(`👍 Exported to ${filePath}`));
  }

  /** The cloud client, or an error toast when no endpoint is configured. */
  private async requireCloud(): Promise<CloudClient | undefined> {
    if (this.cloud) return this.cloud;
    await this.locked((app) => app.error(CLOUD_NOT_CONFIGURED_MESSAGE));
    return undefined;
  }

  private async login(email: string, password: string): Promise<void> {
    const proceed = await this.locked((app) => {
      if (app.session) {
        app.error("Already logged in, Please logout first");
        return false;
      }
      if (!email) {
        app.error("Email cannot be empty");
        return false;
      }
      if (!password) {
        app.error("Password cannot be empty");
        return false;
      }
      return true;
    });
    if (!proceed) return;
    const cloud = await this.requireCloud();
    if (!cloud) return;
    await this.locked((app) => app.info("Logging in, please wait..."));

    let session: UserSession;
    try {
      const tokens = await cloud.login(email, password);
      const userId = await cloud.getUserId(tokens.accessToken);
      session = { ...tokens, email, userId };
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(`Login failed: ${errorMessage(error)}`);
        app.error(cloudFailure(error, error instanceof ApiError && error.kind === "client" ? error.message : "Error logging in"));
      });
      return;
    }

    const { configDir, fromArgs, autoLogin } = await this.locked((app) => {
      app.session = session;
      return { configDir: app.configDir, fromArgs: app.encryptionKey, autoLogin: app.config.autoLogin };
    });
    if (autoLogin) {
      try {
        const key = await readEncryptionKey({ configDir, fromArgs });
        await saveRefreshToken({ configDir, key, token: { refreshToken: session.refreshToken, email } });
      } catch (error) {
        await this.locked((app) => app.logger.error(`Error saving refresh token to disk: ${errorMessage(error)}`));
      }
    }
    await this.locked((app) => {
      if (app.view === "Login") app.goToPreviousView();
      app.info("👍 Logged in");
    });
  }

  private async logout(): Promise<void> {
    const session = await this.locked((app) => {
      if (!app.session) {
        app.error("Not logged in");
        return undefined;
      }
      app.info("Logging out, please wait...");
      return app.session;
    });
    if (!session) return;
    const cloud = await this.requireCloud();
    if (!cloud) return;
    try {
      await cloud.logout(session.accessToken);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(`Logout failed: ${errorMessage(error)}`);
        app.error("Error logging out");
      });
      return;
    }
    await removeIfExists(refreshTokenPath(this.app.configDir));
    await this.locked((app) => {
      app.session = undefined;
      app.cloudSaves = [];
      if (app.view === "LoadCloudSave") app.setView("MainMenu");
      app.info("👍 Logged out");
    });
  }

  private async signUp(email: string, password: string, confirmPassword: string): Promise<void> {
    const proceed = await this.locked((app) => {
      if (app.session) {
        app.error("Already logged in");
        return false;
      }
      if (!email) {
        app.error("Email cannot be empty");
        return false;
      }
      const check = validateNewPassword(password, confirmPassword);
      if (!check.ok) {
        app.error(check.message);
        return false;
      }
      return true;
    });
    if (!proceed) return;
    const cloud = await this.requireCloud();
    if (!cloud) return;
    await this.locked((app) => app.info("Signing up, please wait..."));

    try {
      await cloud.signup(email, password);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(`Signup failed: ${errorMessage(error)}`);
        app.error(cloudFailure(error, "Error signing up"));
      });
      return;
    }
    await this.locked((app) => app.info("👍 Confirmation email sent"));

    let keyPath: string;
    try {
      keyPath = await saveEncryptionKey(this.app.configDir, generateKey());
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(`Error saving encryption key: ${errorMessage(error)}`);
        app.error("Error saving encryption key");
      });
      return;
    }
    await this.locked((app) => {
      app.info(`👍 Encryption key saved at ${keyPath}`);
      app.warn(KEY_SAFETY_WARNING);
    });
  }

  private async sendResetPasswordEmail(email: string): Promise<void> {
    const proceed = await this.locked((app) => {
      const wait = resetLinkWaitSeconds(app.lastResetLinkSentAt, app.now());
      if (wait > 0) {
        app.error(`Please wait for ${wait} seconds before sending another reset password email`);
        return false;
      }
      if (!email) {
        app.error("Email cannot be empty");
        return false;
      }
      return true;
    });
    if (!proceed) return;
    const cloud = await this.requireCloud();
    if (!cloud) return;
    await this.locked((app) => app.info("Sending reset password email, please wait..."));
    try {
      await cloud.recover(email);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(`Reset email failed: ${errorMessage(error)}`);
        app.error(cloudFailure(error, "Error sending reset password email"));
      });
      return;
    }
    await this.locked((app) => {
      app.lastResetLinkSentAt = app.now();
      app.info("👍 Reset password email sent");
    });
  }

  private async resetPassword(resetLink: string, password: string, confirmPassword: string): Promise<void> {
    const proceed = await this.locked((app) => {
      if (!resetLink) {
        app.error("Reset link cannot be empty");
        return false;
      }
      const check = validateNewPassword(password, confirmPassword);
      if (!check.ok) {
        app.error(check.message);
        return false;
      }
      return true;
    });
    if (!proceed) return;
    const cloud = await this.requireCloud();
    if (!cloud) return;
    await this.locked((app) => app.info("Resetting password, please wait..."));

    let accessToken: string;
    try {
      accessToken = await cloud.resolveResetLink(resetLink);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error("Error verifying reset password link");
      });
      return;
    }
    try {
      await cloud.updatePassword(accessToken, password);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error(
          error instanceof ApiError && error.status === 422
            ? "New password should be different from the old password"
            : cloudFailure(error, "Error resetting password"),
        );
      });
      return;
    }
    await this.locked((app) => {
      if (app.view === "ResetPassword") app.goToPreviousView();
      app.info("👍 Password reset successful");
    });
  }

  /** Session, key source and config dir for a logged-in cloud operation; toasts and returns undefined otherwise. */
  private async cloudContext(startMessage?: string) {
    const context = await this.locked((app) => {
      if (!app.session) {
        app.error("Not logged in");
        return undefined;
      }
      if (startMessage) app.info(startMessage);
      return { session: app.session, configDir: app.configDir, fromArgs: app.encryptionKey };
    });
    if (!context) return undefined;
    const cloud = await this.requireCloud();
    return cloud ? { ...context, cloud } : undefined;
  }

  private async syncLocalData(): Promise<void> {
    const context = await this.cloudContext("Syncing local data, please wait...");
    if (!context) return;
    const { session, cloud } = context;
    let key: Buffer;
    try {
      key = await readEncryptionKey({ configDir: context.configDir, fromArgs: context.fromArgs });
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error(`Error syncing local data, Could not get encryption key. ${KEY_RECOVERY_HINT}`);
      });
      return;
    }
    const boards = await this.locked((app) => cloneBoards(app.boards));
    try {
      const saveId = nextSaveId(await cloud.listSaveIds(session.accessToken, session.userId));
      const { ciphertext, nonce } = encryptBoards(boards, key);
      await cloud.createSave(session.accessToken, { userId: session.userId, boardData: ciphertext, nonce, saveId });
      await this.locked((app) => {
        app.info("👍 Local data synced to the cloud");
        app.logger.debug(`Created cloud save ${saveId}`);
        if (app.view === "LoadCloudSave") app.dispatch({ type: "GetCloudData" });
      });
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error(cloudFailure(error, "Error syncing local data"));
      });
    }
  }

  private async getCloudData(): Promise<void> {
    const context = await this.cloudContext("Refreshing cloud data, please wait...");
    if (!context) return;
    const { session, cloud } = context;
    try {
      const saves = await cloud.listSaves(session.accessToken, session.userId);
      await this.locked((app) => {
        app.cloudSaves = [...saves].sort((a, b) => a.saveId - b.saveId);
        app.lists.loadSave = Math.max(0, Math.min(app.lists.loadSave, app.cloudSaves.length - 1));
        app.info("👍 Cloud data loaded");
        if (app.view === "LoadCloudSave" && app.cloudSaves.length > 0) app.dispatch({ type: "LoadCloudPreview" });
      });
    } catch (error) {
      await this.locked((app) => {
        app.logger.error(`Error Refreshing cloud data: ${errorMessage(error)}`);
        app.toasts.error(cloudFailure(error, "Error Refreshing cloud data"));
      });
    }
  }

  /** Decrypts the selected cloud save into the preview, or loads it as the board set. */
  private async loadCloudSave(previewOnly: boolean): Promise<void> {
    const selected = await this.locked((app) => {
      const save = app.cloudSaves[app.lists.loadSave];
      if (!save) app.error(previewOnly ? "No save selected to preview" : "Cannot load save file: No such file");
      return save ? { save, configDir: app.configDir, fromArgs: app.encryptionKey } : undefined;
    });
    if (!selected) return;
    const { save } = selected;
    let key: Buffer;
    try {
      key = await readEncryptionKey({ configDir: selected.configDir, fromArgs: selected.fromArgs });
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error(`Error loading save file, Could not get user encryption key. ${KEY_RECOVERY_HINT}`);
      });
      return;
    }
    let boards: Board[];
    try {
      boards = decryptBoards({ ciphertext: save.boardData, nonce: save.nonce }, key);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error(
          `Error loading save file, Could not decrypt save file. The save must have been created with a different encryption key. ${KEY_RECOVERY_HINT}`,
        );
      });
      return;
    }
    const name = `cloud_save_${save.saveId}`;
    await this.locked((app) => {
      if (previewOnly) {
        app.preview = { name, boards, state: buildProjection(boards, app.windowSize) };
        return;
      }
      app.setBoards(boards);
      app.history.reset();
      app.preview = undefined;
      app.setView(app.config.defaultView);
      app.info(`👍 Save file ${name} loaded`);
    });
  }

  private async deleteCloudSave(): Promise<void> {
    const context = await this.cloudContext();
    if (!context) return;
    const save = await this.locked((app) => {
      const selected = app.cloudSaves[app.lists.loadSave];
      if (!selected) app.error("Cannot delete save file: No such file");
      else app.info("Deleting cloud save, please wait...");
      return selected;
    });
    if (!save) return;
    try {
      await context.cloud.deleteSave(context.session.accessToken, save.id);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error(cloudFailure(error, "Error deleting cloud save"));
      });
      return;
    }
    await this.locked((app) => {
      app.cloudSaves = app.cloudSaves.filter((s) => s.id !== save.id);
      app.lists.loadSave = Math.max(0, Math.min(app.lists.loadSave, app.cloudSaves.length - 1));
      app.preview = undefined;
      app.info(`👍 Cloud save cloud_save_${save.saveId} deleted`);
      if (app.cloudSaves.length > 0) app.dispatch({ type: "LoadCloudPreview" });
    });
  }

  private async saveConfig(message?: string): Promise<void> {
    const { configDir, config } = await this.locked((app) => ({ configDir: app.configDir, config: app.config }));
    try {
      await writeConfig(configDir, config);
    } catch (error) {
      await this.locked((app) => {
        app.logger.debug(errorMessage(error));
        app.error("Cannot save config");
      });
      return;
    }
    await this.locked((app) => app.info(message ?? "Config updated"));
  }

  private async updateConfig(key: string, value: string): Promise<void> {
    const field = CONFIG_FIELDS.find((f) => f.key === key);
    if (!field) {
      await this.locked((app) => app.error(`Unknown config field: ${key}`));
      return;
    }
    const current = await this.locked((app) => app.config);
    const edit = await editConfigValue(current, field, value);
    if (!edit.ok) {
      await this.locked((app) => app.error(edit.error));
      return;
    }
    await this.locked((app) => {
      const resized = edit.config.boardsShown !== app.config.boardsShown || edit.config.cardsShown !== app.config.cardsShown;
      app.config = edit.config;
      if (resized) app.refreshVisible();
    });
    await this.saveConfig(`${field.label} set to ${value.trim()}`);
  }

  private async saveTheme(theme: Theme, setDefault: boolean): Promise<void> {
    const configDir = await this.locked((app) => app.configDir);
    const filePath = await saveCustomTheme(getThemesDir(configDir), theme);
    await this.locked((app) => {
      app.info(`👍 Theme saved at ${filePath}`);
      if (setDefault) app.config = { ...app.config, defaultTheme: theme.name };
    });
    if (setDefault) await this.saveConfig(`Default theme set to '${theme.name}'`);
  }
}
