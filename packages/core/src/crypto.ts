import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { ACCESS_TOKEN_FILE_NAME, ENCRYPTION_KEY_FILE_NAME } from "./config";
import { IntegrityError, errorMessage } from "./errors";
import { writeFileAtomic } from "./files";
import type { Board } from "./model";
import { decodeBoardsJson } from "./persistence";

export const KEY_LENGTH = 32;
export const NONCE_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const ALGORITHM = "aes-256-gcm";
export const REFRESH_TOKEN_SEPARATOR = "|";

export interface EncryptedPayload {
  /** base64url, no padding; ciphertext followed by the 16-byte tag. */
  ciphertext: string;
  nonce: string;
}

export function generateKey(): Buffer {
  return randomBytes(KEY_LENGTH);
}

export function encodeKey(key: Buffer): string {
  return key.toString("base64url");
}

export function decodeKey(encoded: string): Buffer {
  const trimmed = encoded.trim();
  if (!/^[A-Za-z0-9_-]+={0,2}$/.test(trimmed)) throw new IntegrityError("Encryption key is not valid base64");
  const key = Buffer.from(trimmed.replace(/=+$/, ""), "base64url");
  if (key.length !== KEY_LENGTH) throw new IntegrityError(`Encryption key must be ${KEY_LENGTH} bytes`);
  return key;
}

function decodeBase64(encoded: string, what: string): Buffer {
  if (!/^[A-Za-z0-9_-]*$/.test(encoded)) throw new IntegrityError(`Error decoding ${what}`);
  return Buffer.from(encoded, "base64url");
}

export function encryptBytes(plain: Buffer, key: Buffer): EncryptedPayload {
  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  const body = Buffer.concat([cipher.update(plain), cipher.final(), cipher.getAuthTag()]);
  return { ciphertext: body.toString("base64url"), nonce: nonce.toString("base64url") };
}

export function decryptBytes(payload: EncryptedPayload, key: Buffer): Buffer {
  const nonce = decodeBase64(payload.nonce, "nonce");
  const body = decodeBase64(payload.ciphertext, "ciphertext");
  if (nonce.length !== NONCE_LENGTH) throw new IntegrityError("Error decoding nonce");
  if (body.length < AUTH_TAG_LENGTH) throw new IntegrityError("Error decrypting: ciphertext too short");
  const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(body.subarray(body.length - AUTH_TAG_LENGTH));
  try {
    return Buffer.concat([decipher.update(body.subarray(0, body.length - AUTH_TAG_LENGTH)), decipher.final()]);
  } catch (error) {
    throw new IntegrityError(`Error decrypting: ${errorMessage(error)}`);
  }
}

export function encryptBoards(boards: Board[], key: Buffer): EncryptedPayload {
  return encryptBytes(Buffer.from(JSON.stringify(boards), "utf8"), key);
}

export function decryptBoards(payload: EncryptedPayload, key: Buffer): Board[] {
  return decodeBoardsJson(decryptBytes(payload, key).toString("utf8"));
}

export function encryptionKeyPath(configDir: string): string {
  return path.join(configDir, ENCRYPTION_KEY_FILE_NAME);
}

export function refreshTokenPath(configDir: string): string {
  return path.join(configDir, ACCESS_TOKEN_FILE_NAME);
}

export async function saveEncryptionKey(configDir: string, key: Buffer): Promise<string> {
  const filePath = encryptionKeyPath(configDir);
  await writeFileAtomic(filePath, encodeKey(key));
  await fs.chmod(filePath, 0o600);
  return filePath;
}

/** Key passed on the command line wins over the key file. */
export async function readEncryptionKey(args: { configDir: string; fromArgs?: string }): Promise<Buffer> {
  if (args.fromArgs) return decodeKey(args.fromArgs);
  const filePath = encryptionKeyPath(args.configDir);
  let encoded: string;
  try {
    encoded = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new IntegrityError(
        `Encryption key file not found!! Please generate a new one by using the -g flag or move it to the path: ${filePath}`,
      );
    }
    throw error;
  }
  return decodeKey(encoded);
}

export interface StoredRefreshToken {
  refreshToken: string;
  email: string;
}

export function encodeRefreshToken(token: StoredRefreshToken, key: Buffer): string {
  const { ciphertext, nonce } = encryptBytes(Buffer.from(token.refreshToken, "utf8"), key);
  const email = Buffer.from(token.email, "utf8").toString("base64url");
  return [nonce, ciphertext, email].join(REFRESH_TOKEN_SEPARATOR);
}

export function decodeRefreshToken(line: string, key: Buffer): StoredRefreshToken {
  const parts = line.trim().split(REFRESH_TOKEN_SEPARATOR);
  if (parts.length !== 3) throw new IntegrityError("Error reading refresh token file");
  const [nonce, ciphertext, email] = parts;
  return {
    refreshToken: decryptBytes({ nonce, ciphertext }, key).toString("utf8"),
    email: decodeBase64(email, "email").toString("utf8"),
  };
}

export async function saveRefreshToken(args: { configDir: string; key: Buffer; token: StoredRefreshToken }): Promise<void> {
  const filePath = refreshTokenPath(args.configDir);
  await writeFileAtomic(filePath, encodeRefreshToken(args.token, args.key) + "\n");
  await fs.chmod(filePath, 0o600);
}

export async function readRefreshToken(args: { configDir: string; key: Buffer }): Promise<StoredRefreshToken | undefined> {
  let line: string;
  try {
    line = await fs.readFile(refreshTokenPath(args.configDir), "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return undefined;
    throw error;
  }
  return decodeRefreshToken(line, args.key);
}
