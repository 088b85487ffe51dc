import process from "node:process";
import { errorMessage } from "./errors";

export const RATE_LIMIT_MESSAGE =
  "Too many requests, please try again later. The cloud backend only allows a few auth requests per hour. Sorry! 😢";
export const SAVES_PAGE_SIZE = 100;

export type ApiErrorKind = "network" | "client" | "server" | "rate-limit";

export class ApiError extends Error {
  status: number;
  code: string;
  kind: ApiErrorKind;

  constructor(message: string, status: number, code = "API_ERROR", kind: ApiErrorKind = classifyStatus(status)) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.code = code;
    this.kind = kind;
  }
}

export function classifyStatus(status: number): ApiErrorKind {
  if (status === 0) return "network";
  if (status === 429) return "rate-limit";
  if (status >= 500) return "server";
  return "client";
}

export interface CloudEndpoint {
  baseUrl: string;
  anonKey: string;
}

/** `KANBAN_CLOUD_URL` and `KANBAN_CLOUD_ANON_KEY`; undefined when either is missing. */
export function cloudEndpointFromEnv(env: NodeJS.ProcessEnv = process.env): CloudEndpoint | undefined {
  const baseUrl = env.KANBAN_CLOUD_URL?.trim();
  const anonKey = env.KANBAN_CLOUD_ANON_KEY?.trim();
  if (!baseUrl || !anonKey) return undefined;
  return { baseUrl: baseUrl.replace(/\/+$/, ""), anonKey };
}

export interface AuthTokens {
  accessToken: string;
  refreshToken: string;
}

export interface CloudSave {
  id: number;
  createdAt: string;
  userId: string;
  boardData: string;
  nonce: string;
  saveId: number;
}

export interface NewCloudSave {
  userId: string;
  boardData: string;
  nonce: string;
  saveId: number;
}

export type FetchLike = typeof fetch;

function parseJsonSafe(raw: string): unknown {
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function field(payload: unknown, key: string): unknown {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) return undefined;
  return new Map(Object.entries(payload)).get(key);
}

function stringField(payload: unknown, key: string): string | undefined {
  const value = field(payload, key);
  return typeof value === "string" ? value : undefined;
}

function numberField(payload: unknown, key: string): number | undefined {
  const value = field(payload, key);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function normalizeApiError(status: number, payload: unknown): ApiError {
  const message =
    stringField(payload, "error_description") ??
    stringField(payload, "msg") ??
    stringField(payload, "message") ??
    stringField(payload, "error") ??
    `HTTP ${status}`;
  const code = stringField(payload, "error_code") ?? stringField(payload, "code") ?? stringField(payload, "error") ?? "API_ERROR";
  return new ApiError(status === 429 ? RATE_LIMIT_MESSAGE : message, status, code);
}

function parseTokens(payload: unknown): AuthTokens {
  const accessToken = stringField(payload, "access_token");
  const refreshToken = stringField(payload, "refresh_token");
  if (!accessToken || !refreshToken) {
    throw new ApiError(
      "Error logging in, If this is your first login attempt after signup please login again",
      200,
      "MISSING_TOKEN",
      "client",
    );
  }
  return { accessToken, refreshToken };
}

function parseCloudSave(raw: unknown): CloudSave {
  const id = numberField(raw, "id");
  const saveId = numberField(raw, "save_id");
  const createdAt = stringField(raw, "created_at");
  const userId = stringField(raw, "user_id");
  const boardData = stringField(raw, "board_data");
  const nonce = stringField(raw, "nonce");
  if (id === undefined || saveId === undefined || !createdAt || !userId || boardData === undefined || nonce === undefined) {
    throw new ApiError("Error getting cloud saves: malformed record", 200, "MALFORMED_RECORD", "server");
  }
  return { id, createdAt, userId, boardData, nonce, saveId };
}

/** Next ordinal after the highest existing save id, or 0 when there are none. */
export function nextSaveId(saveIds: number[]): number {
  return saveIds.length ? Math.max(...saveIds) + 1 : 0;
}

/** Pulls `access_token` out of the query or fragment of a redirect URL. */
export function accessTokenFromRedirect(url: string): string | undefined {
  const match = /[#?&]access_token=([^&#]+)/.exec(url);
  return match ? decodeURIComponent(match[1]) : undefined;
}

export class CloudClient {
  private readonly baseUrl: string;
  private readonly anonKey: string;
  private readonly fetchImpl: FetchLike;

  constructor(args: CloudEndpoint & { fetch?: FetchLike }) {
    this.baseUrl = args.baseUrl.replace(/\/+$/, "");
    this.anonKey = args.anonKey;
    this.fetchImpl = args.fetch ?? fetch;
  }

  private async send(
    path: string,
    init: { method: string; body?: unknown; token?: string; headers?: Record<string, string> },
  ): Promise<{ status: number; payload: unknown; headers: Headers }> {
    const headers = new Headers(init.headers ?? {});
    headers.set("apikey", this.anonKey);
    headers.set("Accept", "application/json");
    if (init.body !== undefined) headers.set("Content-Type", "application/json");
    if (init.token) headers.set("Authorization", `Bearer ${init.token}`);
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: init.method,
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
      });
    } catch (error) {
      throw new ApiError(`Network error: ${errorMessage(error)}`, 0, "NETWORK_ERROR", "network");
    }
    const payload = parseJsonSafe(await response.text());
    if (!response.ok) throw normalizeApiError(response.status, payload);
    return { status: response.status, payload, headers: response.headers };
  }

  async login(email: string, password: string): Promise<AuthTokens> {
    const { payload } = await this.send("/auth/v1/token?grant_type=password", {
      method: "POST",
      body: { email, password },
    });
    return parseTokens(payload);
  }

  async refresh(refreshToken: string): Promise<AuthTokens> {
    const { payload } = await this.send("/auth/v1/token?grant_type=refresh_token", {
      method: "POST",
      body: { grant_type: "refresh_token", refresh_token: refreshToken },
    });
    return parseTokens(payload);
  }

  async getUserId(accessToken: string): Promise<string> {
    const { payload } = await this.send("/auth/v1/user", { method: "GET", token: accessToken });
    const id = stringField(payload, "id");
    if (!id) throw new ApiError("Error retrieving user data", 200, "MISSING_USER_ID", "server");
    return id;
  }

  /** Resolves with the confirmation timestamp the backend reports. */
  async signup(email: string, password: string): Promise<string> {
    const { payload } = await this.send("/auth/v1/signup", { method: "POST", body: { email, password } });
    const sentAt = stringField(payload, "confirmation_sent_at");
    if (!sentAt) throw new ApiError("Error signing up", 200, "NO_CONFIRMATION", "server");
    return sentAt;
  }

  async recover(email: string): Promise<void> {
    await this.send("/auth/v1/recover", { method: "POST", body: { email } });
  }

  async logout(accessToken: string): Promise<void> {
    await this.send("/auth/v1/logout", { method: "POST", token: accessToken });
  }

  async updatePassword(accessToken: string, password: string): Promise<void> {
    await this.send("/auth/v1/user", { method: "PUT", token: accessToken, body: { password } });
  }

  /** Follows a reset-password email link far enough to read the session it redirects with. */
  async resolveResetLink(link: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(link, { method: "GET", redirect: "manual" });
    } catch (error) {
      throw new ApiError(`Network error: ${errorMessage(error)}`, 0, "NETWORK_ERROR", "network");
    }
    const target = response.headers.get("location") ?? response.url;
    const token = target ? accessTokenFromRedirect(target) : undefined;
    if (!token) throw new ApiError("Error verifying reset password link", response.status, "INVALID_RESET_LINK", "client");
    return token;
  }

  /** Every save row of `userId`, fetched page by page through the `Range` header. */
  async listSaves(accessToken: string, userId: string): Promise<CloudSave[]> {
    const out: CloudSave[] = [];
    for (let from = 0; ; from += SAVES_PAGE_SIZE) {
      const { payload } = await this.send(
        `/rest/v1/user_data?user_id=eq.${encodeURIComponent(userId)}&select=*&order=save_id.asc`,
        { method: "GET", token: accessToken, headers: { Range: `${from}-${from + SAVES_PAGE_SIZE - 1}` } },
      );
      if (!Array.isArray(payload)) throw new ApiError("Error getting save ids", 200, "MALFORMED_RESPONSE", "server");
      out.push(...payload.map(parseCloudSave));
      if (payload.length < SAVES_PAGE_SIZE) return out;
    }
  }

  async listSaveIds(accessToken: string, userId: string): Promise<number[]> {
    const ids: number[] = [];
    for (let from = 0; ; from += SAVES_PAGE_SIZE) {
      const { payload } = await this.send(`/rest/v1/user_data?user_id=eq.${encodeURIComponent(userId)}&select=save_id`, {
        method: "GET",
        token: accessToken,
        headers: { Range: `${from}-${from + SAVES_PAGE_SIZE - 1}` },
      });
      if (!Array.isArray(payload)) throw new ApiError("Error getting save ids", 200, "MALFORMED_RESPONSE", "server");
      for (const row of payload) {
        const saveId = numberField(row, "save_id");
        if (saveId === undefined) throw new ApiError("Error getting save ids", 200, "MALFORMED_RESPONSE", "server");
        ids.push(saveId);
      }
      if (payload.length < SAVES_PAGE_SIZE) return ids;
    }
  }

  async createSave(accessToken: string, save: NewCloudSave): Promise<void> {
    await this.send("/rest/v1/user_data", {
      method: "POST",
      token: accessToken,
      body: { user_id: save.userId, board_data: save.boardData, save_id: save.saveId, nonce: save.nonce },
    });
  }

  async deleteSave(accessToken: string, rowId: number): Promise<void> {
    await this.send(`/rest/v1/user_data?id=eq.${rowId}`, { method: "DELETE", token: accessToken });
  }
}
