import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { describeWeather, fetchWeather, titleCase, unavailable } from "./weather";
import { okWeather } from "./testing";

function respond(body: string, status = 200) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body, { status }));
}

describe("fetchWeather", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("normalizes a provider response", async () => {
    const fetchImpl = respond(
      JSON.stringify({
        name: "Pune",
        main: { temp: 27.4, humidity: 61 },
        weather: [{ description: "scattered clouds", icon: "03d" }],
        wind: { speed: 3.6 },
      })
    );

    const snapshot = await fetchWeather(18.52, 73.85, { apiKey: "test-key", fetchImpl });

    expect(snapshot).toMatchObject({
      status: "ok",
      city: "Pune",
      tempC: 27.4,
      humidity: 61,
      conditions: "Scattered Clouds",
      icon: "03d",
      windSpeed: 3.6,
      latitude: 18.52,
      longitude: 73.85,
    });
    expect(String(fetchImpl.mock.calls[0][0])).toBe(
      "https://api.openweathermap.org/data/2.5/weather?lat=18.52&lon=73.85&units=metric&appid=test-key"
    );
  });

  it("fills absent fields with nulls", async () => {
    const snapshot = await fetchWeather(1, 2, { apiKey: "test-key", fetchImpl: respond("{}") });
    expect(snapshot).toMatchObject({
      status: "ok",
      city: "",
      tempC: null,
      humidity: null,
      conditions: "",
      icon: null,
      windSpeed: null,
    });
  });

  it("is unavailable without an API key", async () => {
    const fetchImpl = respond("{}");
    const snapshot = await fetchWeather(1, 2, { fetchImpl });
    expect(snapshot).toMatchObject({ status: "unavailable", reason: "OPEN_WEATHER_API_KEY is not configured" });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("absorbs a non-2xx response", async () => {
    const snapshot = await fetchWeather(1, 2, { apiKey: "test-key", fetchImpl: respond("{}", 401) });
    expect(snapshot).toMatchObject({ status: "unavailable", reason: "OpenWeather API error: 401" });
  });

  it("absorbs a network error", async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new Error("getaddrinfo ENOTFOUND");
    });
    const snapshot = await fetchWeather(1, 2, { apiKey: "test-key", fetchImpl });
    expect(snapshot).toMatchObject({ status: "unavailable", reason: "getaddrinfo ENOTFOUND" });
  });

  it("absorbs a body that is not JSON", async () => {
    const snapshot = await fetchWeather(1, 2, { apiKey: "test-key", fetchImpl: respond("<html>") });
    expect(snapshot.status).toBe("unavailable");
  });

  it("absorbs a body of the wrong shape", async () => {
    const snapshot = await fetchWeather(1, 2, {
      apiKey: "test-key",
      fetchImpl: respond(JSON.stringify({ main: "hot" })),
    });
    expect(snapshot).toMatchObject({ status: "unavailable", reason: "Malformed weather response" });
  });
});

describe("describeWeather", () => {
  it("renders a snapshot", () => {
    expect(describeWeather(okWeather({ tempC: 27.4, humidity: 61, conditions: "Scattered Clouds" }), "Pune")).toBe(
      "Weather now in Pune: 27.4°C, humidity 61%, conditions Scattered Clouds."
    );
  });

  it("marks missing readings N/A", () => {
    expect(describeWeather(okWeather({ tempC: null, humidity: null, conditions: "" }), "Pune")).toBe(
      "Weather now in Pune: N/A°C, humidity N/A%, conditions N/A."
    );
  });

  it("uses the placeholder when unavailable", () => {
    expect(describeWeather(unavailable("down"), "Pune")).toBe("Weather data unavailable.");
  });
});

describe("titleCase", () => {
  it("capitalizes each word", () => {
    expect(titleCase("light intensity DRIZZLE")).toBe("Light Intensity Drizzle");
  });
});
