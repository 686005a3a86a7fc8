import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Principal, WeatherSnapshot } from "@/app/types";
import { login, register } from "./auth";
import { loadDashboard, MISSING_FIELDS_ERROR, runDashboard } from "./dashboard";
import { SECTION_HEADERS } from "./prompt";
import type { Services } from "./services";
import { fakeInsights, okWeather, testServices } from "./testing";
import { unavailable } from "./weather";

async function signUpAlice(services: Services): Promise<Principal> {
  await register({ farmName: "GreenAcre", username: "alice", password: "x" }, services);
  const result = await login({ username: "alice", password: "x" }, services);
  if (!result.ok) throw new Error(result.error);
  return result.value.principal;
}

describe("runDashboard", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  it("uses the fallback location when none is given", async () => {
    const weather = vi.fn(async (lat: number, lon: number): Promise<WeatherSnapshot> =>
      okWeather({ latitude: lat, longitude: lon, city: "Bangalore" })
    );
    const services = testServices({ weather });
    const alice = await signUpAlice(services);

    const outcome = await runDashboard(alice, { crop: "Tomato", landSize: "2 acres" }, services);
    if (!outcome.ok) throw new Error(outcome.error);

    expect(weather).toHaveBeenCalledWith(12.9716, 77.5946);
    expect(outcome.view.activeResult?.locationName).toBe("Bengaluru");
    expect(outcome.view.activeResult?.usedFallback).toBe(true);
    expect(outcome.view.history).toHaveLength(1);
    expect(outcome.view.farmName).toBe("GreenAcre");
    expect(outcome.view.defaultLocation).toEqual({ lat: 12.9716, lon: 77.5946, city: "Bengaluru" });
  });

  it("names the location after a typed city while weather uses the browser position", async () => {
    const weather = vi.fn(async (): Promise<WeatherSnapshot> => okWeather({ city: "Pune" }));
    const services = testServices({ weather });
    const alice = await signUpAlice(services);

    const outcome = await runDashboard(
      alice,
      { crop: "Onion", landSize: "1 ha", cityName: "Nashik", latitude: "18.52", longitude: "73.85" },
      services
    );
    if (!outcome.ok) throw new Error(outcome.error);

    expect(weather).toHaveBeenCalledWith(18.52, 73.85);
    expect(outcome.view.activeResult?.locationName).toBe("Nashik");
  });

  it("takes the provider city for a browser position", async () => {
    const services = testServices({ weather: async () => okWeather({ city: "Pune" }) });
    const alice = await signUpAlice(services);

    const outcome = await runDashboard(alice, { crop: "Onion", landSize: "1 ha", latitude: 18.52, longitude: 73.85 }, services);
    if (!outcome.ok) throw new Error(outcome.error);

    expect(outcome.view.activeResult?.locationName).toBe("Pune");
  });

  it("falls back when the browser reports coordinates out of range", async () => {
    const weather = vi.fn(async (): Promise<WeatherSnapshot> => okWeather());
    const services = testServices({ weather });
    const alice = await signUpAlice(services);

    const outcome = await runDashboard(alice, { crop: "Onion", landSize: "1 ha", latitude: 999, longitude: 999 }, services);
    if (!outcome.ok) throw new Error(outcome.error);

    expect(weather.mock.calls).toEqual([[12.9716, 77.5946]]);
    expect(outcome.view.activeResult?.locationName).toBe("Bengaluru");
    expect(outcome.view.activeResult?.usedFallback).toBe(true);
  });

  it("treats a coordinate of the wrong type as not reported", async () => {
    const weather = vi.fn(async (): Promise<WeatherSnapshot> => okWeather());
    const services = testServices({ weather });
    const alice = await signUpAlice(services);

    const outcome = await runDashboard(alice, { crop: "Onion", landSize: "1 ha", latitude: true, longitude: 73.85 }, services);
    if (!outcome.ok) throw new Error(outcome.error);

    expect(weather.mock.calls).toEqual([[12.9716, 77.5946]]);
    expect(outcome.view.activeResult?.usedFallback).toBe(true);
  });

  it("keeps the last five runs, newest first", async () => {
    const services = testServices({ weather: async () => okWeather() });
    const alice = await signUpAlice(services);
    const crops = ["Rice", "Wheat", "Maize", "Ragi", "Millet", "Tomato"];

    let last: Awaited<ReturnType<typeof runDashboard>> | undefined;
    for (const crop of crops) {
      last = await runDashboard(alice, { crop, landSize: "2 acres" }, services);
    }
    if (!last?.ok) throw new Error("last run failed");

    expect(last.view.history.map((e) => e.crop)).toEqual(["Tomato", "Millet", "Ragi", "Maize", "Wheat"]);
    expect(last.view.activeResult?.crop).toBe("Tomato");
  });

  it("carries on when weather is unavailable", async () => {
    const insights = fakeInsights();
    const services = testServices({ weather: async () => unavailable("timeout"), insights });
    const alice = await signUpAlice(services);

    const outcome = await runDashboard(alice, { crop: "Tomato", landSize: "2 acres" }, services);
    if (!outcome.ok) throw new Error(outcome.error);
    const entry = outcome.view.activeResult;

    expect(entry?.weather.status).toBe("unavailable");
    expect(insights.prompts[0]).toContain("- Weather data unavailable.");
    expect(entry?.insightsHtml.match(/<h2>/g)).toHaveLength(5);
    for (const title of ["Market-Timed Sowing Window", "Soil Checklist", "Demand Outlook", "Care-to-Harvest Timeline", "Action Notes"]) {
      expect(entry?.insightsHtml).toContain(title);
    }
    expect(entry?.summary.optimalPlantingDate).toBe("Jun 5, 2026");
    expect(Object.keys(entry?.sectionsHtml ?? {})).toHaveLength(SECTION_HEADERS.length);
    expect(entry?.sectionsHtml.marketTimed).toBe("<h2>Market-Timed Sowing Window</h2>\n<p>Sow in the first week of June.</p>");
    expect(entry?.error).toBeNull();
  });

  it("records an AI failure as an error, not as content", async () => {
    const services = testServices({
      weather: async () => okWeather(),
      insights: fakeInsights({ ok: false, error: "Gemini API error: quota exceeded" }),
    });
    const alice = await signUpAlice(services);

    const outcome = await runDashboard(alice, { crop: "Tomato", landSize: "2 acres" }, services);
    if (!outcome.ok) throw new Error(outcome.error);

    expect(outcome.view.activeResult).toMatchObject({
      error: "Gemini API error: quota exceeded",
      insightsHtml: "",
      insightsMarkdown: "",
    });
    expect(outcome.view.history).toHaveLength(1);
  });

  it("rejects a missing land size without calling out", async () => {
    const weather = vi.fn(async (): Promise<WeatherSnapshot> => okWeather());
    const insights = fakeInsights();
    const services = testServices({ weather, insights });
    const alice = await signUpAlice(services);

    const outcome = await runDashboard(alice, { crop: "Tomato", landSize: "  " }, services);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBe(MISSING_FIELDS_ERROR);
      expect(outcome.fieldErrors.landSize).toEqual(["Land size is required"]);
    }
    expect(weather).not.toHaveBeenCalled();
    expect(insights.prompts).toHaveLength(0);
    expect(await services.histories.list("alice")).toEqual([]);
  });
});

describe("loadDashboard", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  it("starts empty", async () => {
    const services = testServices();
    const alice = await signUpAlice(services);

    const view = await loadDashboard(alice, services);

    expect(view).toMatchObject({ activeResult: null, history: [], weather: null, username: "alice" });
  });

  it("shows the newest entry as active", async () => {
    const services = testServices({ weather: async () => okWeather({ city: "Pune" }) });
    const alice = await signUpAlice(services);
    await runDashboard(alice, { crop: "Rice", landSize: "1 acre" }, services);
    await runDashboard(alice, { crop: "Ragi", landSize: "1 acre" }, services);

    const view = await loadDashboard(alice, services);

    expect(view.activeResult?.crop).toBe("Ragi");
    expect(view.weather).toMatchObject({ status: "ok", city: "Pune" });
  });
});
