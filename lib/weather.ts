// ═══════════════════════════════════════════════════════════════════════════
// OpenWeather current-conditions integration
// One GET per request, metric units. Never throws to the caller.
// ═══════════════════════════════════════════════════════════════════════════

import { z } from "zod";
import type { WeatherSnapshot } from "@/app/types";

export const OPEN_WEATHER_URL = "https://api.openweathermap.org/data/2.5/weather";
const TIMEOUT_MS = 15_000;

export const WEATHER_UNAVAILABLE_TEXT = "Weather data unavailable.";

const OpenWeatherResponse = z.object({
  name: z.string().optional(),
  main: z
    .object({
      temp: z.number().optional(),
      humidity: z.number().optional(),
    })
    .optional(),
  weather: z
    .array(
      z.object({
        description: z.string().optional(),
        icon: z.string().optional(),
      })
    )
    .optional(),
  wind: z.object({ speed: z.number().optional() }).optional(),
});

export interface FetchWeatherOptions {
  apiKey?: string;
  fetchImpl?: typeof fetch;
}

export function unavailable(reason: string): WeatherSnapshot {
  return { status: "unavailable", reason, fetchedAt: new Date().toISOString() };
}

/** "light intensity drizzle" → "Light Intensity Drizzle" */
export function titleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, (w) => w[0].toUpperCase() + w.slice(1).toLowerCase());
}

// ── Fetch current weather ─────────────────────────────────────────────────
export async function fetchWeather(
  lat: number,
  lon: number,
  options: FetchWeatherOptions = {}
): Promise<WeatherSnapshot> {
  const { apiKey, fetchImpl = fetch } = options;
  if (!apiKey) return unavailable("OPEN_WEATHER_API_KEY is not configured");
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    return unavailable("latitude and longitude required");
  }

  const url =
    `${OPEN_WEATHER_URL}` +
    `?lat=${encodeURIComponent(lat)}&lon=${encodeURIComponent(lon)}` +
    `&units=metric` +
    `&appid=${encodeURIComponent(apiKey)}`;

  try {
    const res = await fetchImpl(url, { signal: AbortSignal.timeout(TIMEOUT_MS) });
    if (!res.ok) {
      console.warn(`[Weather] ${res.status} ${res.statusText}`);
      return unavailable(`OpenWeather API error: ${res.status}`);
    }

    const parsed = OpenWeatherResponse.safeParse(await res.json());
    if (!parsed.success) {
      console.warn("[Weather] malformed response body");
      return unavailable("Malformed weather response");
    }

    const data = parsed.data;
    const current = data.weather?.[0];
    return {
      status: "ok",
      city: data.name ?? "",
      tempC: data.main?.temp ?? null,
      humidity: data.main?.humidity ?? null,
      conditions: titleCase(current?.description ?? ""),
      icon: current?.icon ?? null,
      windSpeed: data.wind?.speed ?? null,
      latitude: lat,
      longitude: lon,
      fetchedAt: new Date().toISOString(),
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : "Weather fetch failed";
    console.warn("[Weather] request failed:", message);
    return unavailable(message);
  }
}

// ── Prompt line ───────────────────────────────────────────────────────────
export function describeWeather(weather: WeatherSnapshot, locationName: string): string {
  if (weather.status !== "ok") return WEATHER_UNAVAILABLE_TEXT;
  const na = (v: number | string | null) => (v === null || v === "" ? "N/A" : v);
  return (
    `Weather now in ${locationName}: ` +
    `${na(weather.tempC)}°C, ` +
    `humidity ${na(weather.humidity)}%, ` +
    `conditions ${na(weather.conditions)}.`
  );
}
