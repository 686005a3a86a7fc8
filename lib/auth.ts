import bcrypt from "bcryptjs";
import { z } from "zod";
import type { Principal } from "@/app/types";
import { newSessionToken, signToken, verifyToken } from "@/lib/session";
import type { Services } from "@/lib/services";

const BCRYPT_ROUNDS = 10;

export const DEFAULT_FARM_NAME = "AgroPulse Farm";

export type AuthResult<T> = { ok: true; value: T } | { ok: false; status: 400 | 401 | 409; error: string };

const Credentials = z.object({
  username: z.string().trim().toLowerCase().min(1),
  password: z.string().trim().min(1),
});

const Registration = Credentials.extend({
  farmName: z.string().trim().default(""),
});

export async function register(
  input: unknown,
  services: Pick<Services, "users">
): Promise<AuthResult<Principal>> {
  const parsed = Registration.safeParse(input);
  if (!parsed.success) {
    return { ok: false, status: 400, error: "Username & password are required." };
  }

  const { username, password, farmName } = parsed.data;
  if (await services.users.get(username)) {
    return { ok: false, status: 409, error: "That username already exists." };
  }

  const created = await services.users.create({
    username,
    farmName,
    passwordHash: await bcrypt.hash(password, BCRYPT_ROUNDS),
    createdAt: new Date().toISOString(),
  });
  if (!created) {
    return { ok: false, status: 409, error: "That username already exists." };
  }

  console.info(`[Auth] registered ${username}`);
  return { ok: true, value: { username, farmName: farmName || DEFAULT_FARM_NAME } };
}

export interface LoginSuccess {
  principal: Principal;
  cookieValue: string;
}

/** `previousCookie` is the caller's current session cookie, if any; its session is replaced. */
export async function login(
  input: unknown,
  services: Pick<Services, "users" | "sessions" | "sessionSecret">,
  previousCookie?: string
): Promise<AuthResult<LoginSuccess>> {
  const invalid = { ok: false, status: 401, error: "Invalid credentials, try again." } as const;

  const parsed = Credentials.safeParse(input);
  if (!parsed.success) return invalid;

  const { username, password } = parsed.data;
  const user = await services.users.get(username);
  if (!user || !(await bcrypt.compare(password, user.passwordHash))) return invalid;

  const previous = verifyToken(previousCookie, services.sessionSecret);
  if (previous) await services.sessions.delete(previous);

  const token = newSessionToken();
  await services.sessions.put(token, username);
  return {
    ok: true,
    value: {
      principal: { username, farmName: user.farmName || DEFAULT_FARM_NAME },
      cookieValue: signToken(token, services.sessionSecret),
    },
  };
}

export async function logout(
  cookieValue: string | undefined,
  services: Pick<Services, "sessions" | "sessionSecret">
): Promise<void> {
  const token = verifyToken(cookieValue, services.sessionSecret);
  if (token) await services.sessions.delete(token);
}

export async function resolvePrincipal(
  cookieValue: string | undefined,
  services: Pick<Services, "users" | "sessions" | "sessionSecret">
): Promise<Principal | null> {
  const token = verifyToken(cookieValue, services.sessionSecret);
  if (!token) return null;

  const username = await services.sessions.get(token);
  if (!username) return null;

  const user = await services.users.get(username);
  if (!user) return null;
  return { username, farmName: user.farmName || DEFAULT_FARM_NAME };
}
