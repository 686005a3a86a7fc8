// In-process fakes for the weather lookup and Gemini, shared by the test suites.

import type { WeatherInfo, WeatherSnapshot } from "@/app/types";
import type { AIResult, InsightsGenerator } from "@/lib/gemini";
import type { Services } from "@/lib/services";
import { MemoryHistoryStore, MemorySessionStore, MemoryUserStore } from "@/lib/store";
import { unavailable } from "@/lib/weather";

export const TEST_FALLBACK = { lat: 12.9716, lon: 77.5946, city: "Bengaluru" };

export const PLAN_SECTIONS = {
  market_timed: "## Market-Timed Sowing Window\nSow in the first week of June.",
  weather_soil: "## Weather & Soil Checklist\n- Keep beds moist",
  demand_outlook: "## Demand Outlook & Alternatives\nPrices firm up in September.",
  timeline: "## Care-to-Harvest Timeline\n- **Week 1:** Transplant seedlings",
  actions: "## Action Notes\n1. Book drip lines",
};

export const PLAN_JSON = JSON.stringify({
  summary: {
    optimal_planting_date: "Jun 5, 2026",
    expected_harvest_date: "Sep 12, 2026",
    expected_market_price_inr: "₹18,000 per ton",
    irrigation_method: "Drip irrigation",
    watering_frequency: "Every 2 days",
  },
  sections: PLAN_SECTIONS,
});

export function okWeather(overrides: Partial<WeatherInfo> = {}): WeatherInfo {
  return {
    status: "ok",
    city: "",
    tempC: 24,
    humidity: 70,
    conditions: "Mist",
    icon: "50d",
    windSpeed: 2.1,
    latitude: TEST_FALLBACK.lat,
    longitude: TEST_FALLBACK.lon,
    fetchedAt: "2026-06-01T06:00:00.000Z",
    ...overrides,
  };
}

export function fakeInsights(result: AIResult = { ok: true, text: PLAN_JSON }) {
  const prompts: string[] = [];
  const generator: InsightsGenerator & { prompts: string[] } = {
    prompts,
    async generate(prompt: string) {
      prompts.push(prompt);
      return result;
    },
  };
  return generator;
}

export function testServices(overrides: Partial<Services> = {}): Services {
  return {
    users: new MemoryUserStore(),
    sessions: new MemorySessionStore(),
    histories: new MemoryHistoryStore(),
    weather: async (): Promise<WeatherSnapshot> => unavailable("not stubbed"),
    insights: fakeInsights(),
    sessionSecret: "test-secret",
    fallback: TEST_FALLBACK,
    ...overrides,
  };
}
