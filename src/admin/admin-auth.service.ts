import { createHash, createHmac, randomBytes, timingSafeEqual } from "node:crypto";

export interface AdminSessionPayload {
  sub: "admin";
  iat: number;
  exp: number;
  nonce: string;
}

/** Compares a presented admin secret with the configured one in constant time. */
export function verifyAdminSecret(provided: string | undefined, expected: string): boolean {
  if (!provided || !expected) {
    return false;
  }
  const a = createHash("sha256").update(provided).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

export function issueAdminSessionToken(input: {
  secret: string;
  ttlSeconds: number;
  nowSec?: number;
}): string {
  const now = input.nowSec ?? Math.floor(Date.now() / 1000);
  const payload: AdminSessionPayload = {
    sub: "admin",
    iat: now,
    exp: now + input.ttlSeconds,
    nonce: randomBytes(8).toString("hex"),
  };
  const header = { alg: "HS256", typ: "JWT" };
  const data = `${toBase64Url(JSON.stringify(header))}.${toBase64Url(JSON.stringify(payload))}`;
  const signature = createHmac("sha256", input.secret).update(data).digest();
  return `${data}.${toBase64Url(signature)}`;
}

export function verifyAdminSessionToken(
  token: string,
  secret: string,
  nowSec: number = Math.floor(Date.now() / 1000),
): AdminSessionPayload | null {
  const parts = token.split(".");
  if (parts.length !== 3) {
    return null;
  }

  const [headerB64, payloadB64, signatureB64] = parts;
  const expectedSig = createHmac("sha256", secret).update(`${headerB64}.${payloadB64}`).digest();
  const providedSig = Buffer.from(signatureB64, "base64url");
  if (providedSig.length !== expectedSig.length || !timingSafeEqual(providedSig, expectedSig)) {
    return null;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payloadB64, "base64url").toString("utf8"));
  } catch {
    return null;
  }
  const payload = readSessionPayload(decoded);
  if (!payload || payload.exp <= nowSec) {
    return null;
  }
  return payload;
}

export function extractCookie(headerValue: string | undefined, cookieName: string): string | null {
  if (!headerValue) {
    return null;
  }
  for (const part of headerValue.split(";")) {
    const [name, ...rest] = part.trim().split("=");
    if (name === cookieName) {
      return decodeURIComponent(rest.join("="));
    }
  }
  return null;
}

export function buildSessionCookie(name: string, token: string, maxAgeSec: number, secure: boolean): string {
  const attributes = [
    `${name}=${encodeURIComponent(token)}`,
    "Path=/admin",
    "HttpOnly",
    "SameSite=Strict",
    `Max-Age=${maxAgeSec}`,
  ];
  if (secure) {
    attributes.push("Secure");
  }
  return attributes.join("; ");
}

function readSessionPayload(value: unknown): AdminSessionPayload | null {
  if (typeof value !== "object" || value === null) {
    return null;
  }
  const sub = "sub" in value ? value.sub : undefined;
  const iat = "iat" in value ? value.iat : undefined;
  const exp = "exp" in value ? value.exp : undefined;
  const nonce = "nonce" in value ? value.nonce : undefined;
  if (sub !== "admin" || typeof iat !== "number" || typeof exp !== "number" || typeof nonce !== "string") {
    return null;
  }
  if (!Number.isInteger(iat) || !Number.isInteger(exp)) {
    return null;
  }
  return { sub, iat, exp, nonce };
}

function toBase64Url(input: string | Buffer): string {
  return Buffer.from(input).toString("base64url");
}
