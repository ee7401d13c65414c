import crypto from "crypto";

const digest = (s: string) => crypto.createHash("sha256").update(s).digest();

/** Constant-time comparison of `Authorization: Bearer <token>` against the worker secret. */
export function verifyBearer(header: string | undefined, secret: string): boolean {
  if (!header || !secret) return false;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  const token = match?.[1];
  if (!token) return false;
  // equal-length digests keep timingSafeEqual from leaking the secret's length
  return crypto.timingSafeEqual(digest(token), digest(secret));
}
