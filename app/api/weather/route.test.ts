import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NextRequest } from "next/server";
import type { WeatherSnapshot } from "@/app/types";
import { login, register } from "@/lib/auth";
import { setServices, type Services } from "@/lib/services";
import { SESSION_COOKIE } from "@/lib/session";
import { okWeather, testServices } from "@/lib/testing";
import { unavailable } from "@/lib/weather";
import { GET } from "./route";

describe("GET /api/weather", () => {
  let services: Services;
  let cookie: string;
  const weather = vi.fn(async (lat: number, lon: number): Promise<WeatherSnapshot> =>
    okWeather({ latitude: lat, longitude: lon, city: "Pune" })
  );

  function request(query: string, withSession = true) {
    return new NextRequest(`http://localhost/api/weather${query}`, {
      headers: withSession ? { cookie: `${SESSION_COOKIE}=${cookie}` } : {},
    });
  }

  beforeEach(async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    weather.mockClear();
    services = testServices({ weather });
    setServices(services);
    await register({ username: "alice", password: "x" }, services);
    const result = await login({ username: "alice", password: "x" }, services);
    if (!result.ok) throw new Error(result.error);
    cookie = result.value.cookieValue;
  });

  afterEach(() => {
    setServices();
    vi.restoreAllMocks();
  });

  it("returns the snapshot for the given coordinates", async () => {
    const res = await GET(request("?lat=18.52&lon=73.85"));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", city: "Pune", latitude: 18.52, longitude: 73.85 });
    expect(weather).toHaveBeenCalledWith(18.52, 73.85);
  });

  it("requires a session", async () => {
    const res = await GET(request("?lat=18.52&lon=73.85", false));
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "Authentication required" });
    expect(weather).not.toHaveBeenCalled();
  });

  it.each(["", "?lat=18.52", "?lat=&lon=73.85", "?lat=abc&lon=73.85", "?lat=999&lon=999", "?lat=18.52&lon=-200"])(
    "answers 400 for %s",
    async (query) => {
      const res = await GET(request(query));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "latitude and longitude required" });
      expect(weather).not.toHaveBeenCalled();
    }
  );

  it("answers 502 when the provider is down", async () => {
    weather.mockResolvedValueOnce(unavailable("OpenWeather API error: 503"));

    const res = await GET(request("?lat=18.52&lon=73.85"));

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "weather unavailable", reason: "OpenWeather API error: 503" });
  });
});
