import { getConfig } from "@/lib/config";
import { createGeminiClient, type InsightsGenerator } from "@/lib/gemini";
import {
  MemoryHistoryStore,
  MemorySessionStore,
  MemoryUserStore,
  type HistoryStore,
  type SessionStore,
  type UserStore,
} from "@/lib/store";
import { fetchWeather } from "@/lib/weather";
import type { DefaultLocation, WeatherSnapshot } from "@/app/types";

export type WeatherLookup = (lat: number, lon: number) => Promise<WeatherSnapshot>;

export interface Services {
  users: UserStore;
  sessions: SessionStore;
  histories: HistoryStore;
  weather: WeatherLookup;
  insights: InsightsGenerator;
  sessionSecret: string;
  fallback: DefaultLocation;
}

export function createServices(overrides: Partial<Services> = {}): Services {
  const config = getConfig();
  return {
    users: new MemoryUserStore(),
    sessions: new MemorySessionStore(),
    histories: new MemoryHistoryStore(),
    weather: (lat, lon) => fetchWeather(lat, lon, { apiKey: config.openWeatherApiKey }),
    insights: createGeminiClient({ apiKey: config.geminiApiKey, model: config.geminiModel }),
    sessionSecret: config.sessionSecret,
    fallback: config.fallback,
    ...overrides,
  };
}

// Kept on globalThis so dev-mode module reloads share one set of stores.
declare global {
  // eslint-disable-next-line no-var
  var agropulseServices: Services | undefined;
}

export function getServices(): Services {
  if (!globalThis.agropulseServices) {
    globalThis.agropulseServices = createServices();
  }
  return globalThis.agropulseServices;
}

/** Replaces the process-wide services; pass nothing to rebuild on next use. */
export function setServices(services?: Services): void {
  globalThis.agropulseServices = services;
}
