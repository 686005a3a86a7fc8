import { randomBytes } from "crypto";
import { sign, unsign } from "cookie-signature";

export const SESSION_COOKIE = "agropulse_session";

/** Seven days, for both the cookie and the server-side entry. */
export const SESSION_MAX_AGE_SECONDS = 60 * 60 * 24 * 7;

export const sessionCookieOptions = {
  httpOnly: true,
  sameSite: "lax" as const,
  path: "/",
  maxAge: SESSION_MAX_AGE_SECONDS,
  secure: process.env.NODE_ENV === "production",
};

export function newSessionToken(): string {
  return randomBytes(32).toString("base64url");
}

/** Cookie value: `<token>.<signature>` */
export function signToken(token: string, secret: string): string {
  return sign(token, secret);
}

/** Returns the bare token, or null when the value is malformed or the signature does not match. */
export function verifyToken(value: string | undefined | null, secret: string): string | null {
  if (!value) return null;
  const token = unsign(value, secret);
  return token ? token : null;
}
