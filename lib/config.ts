// ═══════════════════════════════════════════════════════════════════════════
// AgroPulse: Runtime configuration
// Read from process.env once, validated with zod
// ═══════════════════════════════════════════════════════════════════════════

import { randomBytes } from "crypto";
import { z } from "zod";
import type { DefaultLocation } from "@/app/types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const coordinate = (fallback: number, min: number, max: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? Number(v) : fallback))
    .pipe(z.number().min(min).max(max));

const EnvSchema = z.object({
  GEMINI_API_KEY: optionalKey,
  GEMINI_MODEL: optionalKey.transform((v) => v ?? "gemini-2.5-flash"),
  OPEN_WEATHER_API_KEY: optionalKey,
  SESSION_SECRET: optionalKey,
  FLASK_SECRET_KEY: optionalKey,
  DEFAULT_LAT: coordinate(12.9716, -90, 90),
  DEFAULT_LON: coordinate(77.5946, -180, 180),
  DEFAULT_CITY: optionalKey.transform((v) => v ?? "Bengaluru"),
});

export interface AppConfig {
  geminiApiKey?: string;
  geminiModel: string;
  openWeatherApiKey?: string;
  sessionSecret: string;
  fallback: DefaultLocation;
}

let cached: AppConfig | null = null;

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join(".") || "environment";
    throw new ConfigError(`Invalid ${name}: ${issue?.message ?? "unknown error"}`);
  }
  const e = parsed.data;
  const secret = e.SESSION_SECRET ?? e.FLASK_SECRET_KEY;
  if (!secret) {
    console.warn("[Config] SESSION_SECRET not set; sessions will not survive a restart");
  }
  return {
    geminiApiKey: e.GEMINI_API_KEY,
    geminiModel: e.GEMINI_MODEL,
    openWeatherApiKey: e.OPEN_WEATHER_API_KEY,
    sessionSecret: secret ?? randomBytes(32).toString("hex"),
    fallback: { lat: e.DEFAULT_LAT, lon: e.DEFAULT_LON, city: e.DEFAULT_CITY },
  };
}

export function getConfig(): AppConfig {
  if (!cached) cached = parseConfig(process.env);
  return cached;
}

/** Drops the cached config so the next getConfig() re-reads process.env. */
export function resetConfig(): void {
  cached = null;
}
