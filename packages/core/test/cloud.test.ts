import { beforeEach, describe, expect, it } from "vitest";

import {
  ApiError,
  CloudClient,
  RATE_LIMIT_MESSAGE,
  SAVES_PAGE_SIZE,
  accessTokenFromRedirect,
  cloudEndpointFromEnv,
  nextSaveId,
  normalizeApiError,
} from "../src/cloud";
import { FAKE_CLOUD_URL, FakeCloud } from "./fake-cloud";

describe("cloud helpers", () => {
  it("reads the endpoint from the environment", () => {
    expect(cloudEndpointFromEnv({ KANBAN_CLOUD_URL: "https://cloud.test//", KANBAN_CLOUD_ANON_KEY: "test-anon-key" })).toEqual({
      baseUrl: "https://cloud.test",
      anonKey: "test-anon-key",
    });
    expect(cloudEndpointFromEnv({ KANBAN_CLOUD_URL: "https://cloud.test" })).toBeUndefined();
  });

  it("numbers the next save after the highest existing one", () => {
    expect(nextSaveId([])).toBe(0);
    expect(nextSaveId([0, 3, 1])).toBe(4);
  });

  it("pulls the access token from a redirect fragment or query", () => {
    expect(accessTokenFromRedirect("https://app.test/#access_token=abc&type=recovery")).toBe("abc");
    expect(accessTokenFromRedirect("https://app.test/?x=1&access_token=a%2Bb")).toBe("a+b");
    expect(accessTokenFromRedirect("https://app.test/#error=denied")).toBeUndefined();
  });

  it("normalizes error bodies and classifies statuses", () => {
    const err = normalizeApiError(400, { error: "invalid_grant", error_description: "Invalid login credentials" });
    expect(err).toBeInstanceOf(ApiError);
    expect(err.message).toBe("Invalid login credentials");
    expect(err.code).toBe("invalid_grant");
    expect(err.kind).toBe("client");

    expect(normalizeApiError(503, null)).toMatchObject({ message: "HTTP 503", kind: "server", code: "API_ERROR" });
    expect(normalizeApiError(429, { msg: "slow down" })).toMatchObject({ message: RATE_LIMIT_MESSAGE, kind: "rate-limit" });
  });
});

describe("CloudClient", () => {
  let cloud: FakeCloud;
  let client: CloudClient;

  beforeEach(() => {
    cloud = new FakeCloud();
    client = new CloudClient({ baseUrl: FAKE_CLOUD_URL, anonKey: "test-anon-key", fetch: cloud.fetch });
  });

  it("logs in and resolves the user id", async () => {
    cloud.addUser("a@test", "test-password");
    const tokens = await client.login("a@test", "test-password");
    expect(tokens).toEqual({ accessToken: "access-user-1", refreshToken: "refresh-user-1" });
    expect(await client.getUserId(tokens.accessToken)).toBe("user-1");
    expect(cloud.requests).toEqual([
      { method: "POST", path: "/auth/v1/token?grant_type=password" },
      { method: "GET", path: "/auth/v1/user" },
    ]);
  });

  it("rejects an unknown token as a client error", async () => {
    await expect(client.getUserId("access-nobody")).rejects.toMatchObject({ status: 401, kind: "client" });
  });

  it("wraps a failing transport as a network error", async () => {
    const offline = new CloudClient({
      baseUrl: FAKE_CLOUD_URL,
      anonKey: "test-anon-key",
      fetch: () => Promise.reject(new Error("connection refused")),
    });
    await expect(offline.recover("a@test")).rejects.toMatchObject({
      message: "Network error: connection refused",
      kind: "network",
      status: 0,
    });
  });

  it("pages through every save of the user in save id order", async () => {
    const user = cloud.addUser("a@test", "test-password");
    const other = cloud.addUser("b@test", "test-password");
    for (let i = SAVES_PAGE_SIZE + 4; i >= 0; i--) cloud.addRow(user.id, i);
    cloud.addRow(other.id, 0);

    const saves = await client.listSaves(`access-${user.id}`, user.id);
    expect(saves).toHaveLength(SAVES_PAGE_SIZE + 5);
    expect(saves[0]?.saveId).toBe(0);
    expect(saves[saves.length - 1]?.saveId).toBe(SAVES_PAGE_SIZE + 4);
    expect(cloud.requests.filter((r) => r.path.includes("select=*"))).toHaveLength(2);

    const ids = await client.listSaveIds(`access-${user.id}`, user.id);
    expect(nextSaveId(ids)).toBe(SAVES_PAGE_SIZE + 5);
  });

  it("creates and deletes save rows", async () => {
    const user = cloud.addUser("a@test", "test-password");
    const token = `access-${user.id}`;
    await client.createSave(token, { userId: user.id, boardData: "cipher", nonce: "nonce", saveId: 0 });
    const [save] = await client.listSaves(token, user.id);
    expect(save).toMatchObject({ userId: user.id, boardData: "cipher", nonce: "nonce", saveId: 0 });

    if (!save) throw new Error("save missing");
    await client.deleteSave(token, save.id);
    expect(await client.listSaves(token, user.id)).toEqual([]);
  });

  it("follows a reset link far enough to read its session token", async () => {
    cloud.addUser("a@test", "test-password");
    expect(await client.resolveResetLink("https://reset.test/verify?email=a%40test")).toBe("access-user-1");
    await expect(client.resolveResetLink("https://reset.test/verify?email=x%40test")).rejects.toMatchObject({
      message: "Error verifying reset password link",
    });
  });
});
