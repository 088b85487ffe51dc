import crypto from "node:crypto";

export type BoardId = string;
export type CardId = string;

/** Stable across saves; cloud and local files carry the same ids. */
export function newId(): string {
  return crypto.randomUUID();
}
