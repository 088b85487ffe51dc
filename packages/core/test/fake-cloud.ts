import type { FetchLike } from "../src/cloud";

export const FAKE_CLOUD_URL = "https://cloud.test";

interface FakeUser {
  id: string;
  email: string;
  password: string;
}

interface FakeRow {
  id: number;
  created_at: string;
  user_id: string;
  board_data: string;
  nonce: string;
  save_id: number;
}

export interface FakeRequest {
  method: string;
  path: string;
}

function json(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), { status, headers: { "Content-Type": "application/json" } });
}

function requestUrl(input: Parameters<FetchLike>[0]): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

function readBody(init: RequestInit | undefined): Record<string, unknown> {
  if (typeof init?.body !== "string") return {};
  const parsed: unknown = JSON.parse(init.body);
  return parsed && typeof parsed === "object" ? Object.fromEntries(Object.entries(parsed)) : {};
}

function text(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  return typeof value === "string" ? value : "";
}

/** In-process stand-in for the auth and `user_data` REST routes the cloud client calls. */
export class FakeCloud {
  readonly users: FakeUser[] = [];
  readonly rows: FakeRow[] = [];
  readonly requests: FakeRequest[] = [];
  /** Set to answer every request with this status. */
  failWith?: number;
  private nextRowId = 1;

  addUser(email: string, password: string): FakeUser {
    const user = { id: `user-${this.users.length + 1}`, email, password };
    this.users.push(user);
    return user;
  }

  addRow(userId: string, saveId: number, boardData = "data", nonce = "nonce"): FakeRow {
    const row: FakeRow = {
      id: this.nextRowId++,
      created_at: `2030-01-0${(saveId % 9) + 1}T00:00:00Z`,
      user_id: userId,
      board_data: boardData,
      nonce,
      save_id: saveId,
    };
    this.rows.push(row);
    return row;
  }

  readonly fetch: FetchLike = async (...args: Parameters<FetchLike>) => {
    const [input, init] = args;
    const url = new URL(requestUrl(input));
    const method = init?.method ?? "GET";
    const route = `${url.pathname}${url.search}`;
    this.requests.push({ method, path: route });
    if (this.failWith !== undefined) return json({ msg: "failure" }, this.failWith);

    const headers = new Headers(init?.headers);
    const body = readBody(init);
    const bearer = headers.get("Authorization")?.replace(/^Bearer /, "");
    const current = this.users.find((u) => bearer === `access-${u.id}`);

    if (url.host === "reset.test") {
      const user = this.users.find((u) => u.email === url.searchParams.get("email"));
      if (!user) return json({ msg: "Link expired" }, 403);
      return new Response(null, { status: 303, headers: { location: `https://app.test/#access_token=access-${user.id}` } });
    }

    if (url.pathname === "/auth/v1/token") {
      const grant = url.searchParams.get("grant_type");
      const user =
        grant === "password"
          ? this.users.find((u) => u.email === text(body, "email") && u.password === text(body, "password"))
          : this.users.find((u) => text(body, "refresh_token") === `refresh-${u.id}`);
      if (!user) return json({ error: "invalid_grant", error_description: "Invalid login credentials" }, 400);
      return json({ access_token: `access-${user.id}`, refresh_token: `refresh-${user.id}` });
    }
    if (url.pathname === "/auth/v1/signup" && method === "POST") {
      this.addUser(text(body, "email"), text(body, "password"));
      return json({ confirmation_sent_at: "2030-01-01T00:00:00Z" });
    }
    if (url.pathname === "/auth/v1/recover") return json({});

    if (!current) return json({ msg: "Invalid token" }, 401);

    if (url.pathname === "/auth/v1/user") {
      if (method === "PUT") current.password = text(body, "password");
      return json({ id: current.id });
    }
    if (url.pathname === "/auth/v1/logout") return json({});

    if (url.pathname === "/rest/v1/user_data") {
      if (method === "POST") {
        this.addRow(text(body, "user_id"), Number(body.save_id), text(body, "board_data"), text(body, "nonce"));
        return json({}, 201);
      }
      if (method === "DELETE") {
        const id = Number(url.searchParams.get("id")?.replace(/^eq\./, ""));
        const index = this.rows.findIndex((r) => r.id === id);
        if (index !== -1) this.rows.splice(index, 1);
        return json({});
      }
      const owned = this.rows
        .filter((r) => r.user_id === current.id)
        .sort((a, b) => a.save_id - b.save_id);
      const [from, to] = (headers.get("Range") ?? `0-${owned.length}`).split("-").map(Number);
      const page = owned.slice(from, to + 1);
      return json(url.searchParams.get("select") === "save_id" ? page.map((r) => ({ save_id: r.save_id })) : page);
    }
    return json({ msg: "Not found" }, 404);
  };
}
