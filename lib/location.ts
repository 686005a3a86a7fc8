import type { DefaultLocation, WeatherSnapshot } from "@/app/types";

export interface LocationInput {
  cityName?: string | null;
  latitude?: string | number | null;
  longitude?: string | number | null;
}

export interface ResolvedLocation {
  lat: number;
  lon: number;
  /** Empty when the name is left to the weather provider. */
  name: string;
  usedFallback: boolean;
}

function toCoordinate(value: string | number | null | undefined, limit: number): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" && value.trim() === "") return null;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) && Math.abs(n) <= limit ? n : null;
}

/** Both coordinates, or null unless each is a number within latitude/longitude range. */
export function parseCoordinates(
  latitude: string | number | null | undefined,
  longitude: string | number | null | undefined
): { lat: number; lon: number } | null {
  const lat = toCoordinate(latitude, 90);
  const lon = toCoordinate(longitude, 180);
  return lat === null || lon === null ? null : { lat, lon };
}

/**
 * Picks the coordinates and display name for a dashboard run.
 * A typed city always wins the name; coordinates come from the browser when
 * both are usable, otherwise from the configured fallback.
 */
export function resolveLocation(input: LocationInput, fallback: DefaultLocation): ResolvedLocation {
  const override = input.cityName?.trim() ?? "";
  const coords = parseCoordinates(input.latitude, input.longitude);

  if (!coords) {
    return {
      lat: fallback.lat,
      lon: fallback.lon,
      name: override || fallback.city,
      usedFallback: true,
    };
  }

  return { ...coords, name: override, usedFallback: false };
}

export function finalLocationName(resolved: ResolvedLocation, weather: WeatherSnapshot): string {
  if (resolved.name) return resolved.name;
  if (weather.status === "ok" && weather.city) return weather.city;
  return `Lat ${resolved.lat}, Lon ${resolved.lon}`;
}
