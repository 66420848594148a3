import assert from "node:assert/strict";
import { test } from "node:test";
import {
  buildSessionCookie,
  extractCookie,
  issueAdminSessionToken,
  verifyAdminSecret,
  verifyAdminSessionToken,
} from "../../admin/admin-auth.service";

const SECRET = "test-secret";

test("admin secret comparison", () => {
  assert.equal(verifyAdminSecret("test-secret", SECRET), true);
  assert.equal(verifyAdminSecret("test-secreT", SECRET), false);
  assert.equal(verifyAdminSecret(undefined, SECRET), false);
  assert.equal(verifyAdminSecret("", ""), false);
});

test("session tokens verify until they expire", () => {
  const token = issueAdminSessionToken({ secret: SECRET, ttlSeconds: 600, nowSec: 1_000 });
  const payload = verifyAdminSessionToken(token, SECRET, 1_300);
  assert.equal(payload?.sub, "admin");
  assert.equal(payload?.iat, 1_000);
  assert.equal(payload?.exp, 1_600);
  assert.equal(verifyAdminSessionToken(token, SECRET, 1_600), null);
});

test("tampered or foreign tokens are rejected", () => {
  const token = issueAdminSessionToken({ secret: SECRET, ttlSeconds: 600, nowSec: 1_000 });
  const [header, , signature] = token.split(".");
  const forgedPayload = Buffer.from(JSON.stringify({ sub: "admin", iat: 1_000, exp: 99_999, nonce: "x" })).toString(
    "base64url",
  );
  assert.equal(verifyAdminSessionToken(`${header}.${forgedPayload}.${signature}`, SECRET, 1_100), null);
  assert.equal(verifyAdminSessionToken(token, "other-secret", 1_100), null);
  assert.equal(verifyAdminSessionToken("not-a-token", SECRET, 1_100), null);
});

test("cookies are built and read back", () => {
  assert.equal(
    buildSessionCookie("intake_admin_session", "a.b.c", 3600, true),
    "intake_admin_session=a.b.c; Path=/admin; HttpOnly; SameSite=Strict; Max-Age=3600; Secure",
  );
  assert.equal(extractCookie("theme=dark; intake_admin_session=a.b.c", "intake_admin_session"), "a.b.c");
  assert.equal(extractCookie("theme=dark", "intake_admin_session"), null);
  assert.equal(extractCookie(undefined, "intake_admin_session"), null);
});
