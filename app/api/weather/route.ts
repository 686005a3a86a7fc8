import { NextResponse, type NextRequest } from "next/server";
import { jsonError, principalFrom, unauthorized } from "@/lib/http";
import { parseCoordinates } from "@/lib/location";
import { getServices } from "@/lib/services";

/**
 * GET /api/weather?lat=..&lon=..
 *
 * Current conditions for the signed-in grower's coordinates.
 */
export async function GET(request: NextRequest) {
  try {
    const services = getServices();
    if (!(await principalFrom(request, services))) return unauthorized();

    const coords = parseCoordinates(
      request.nextUrl.searchParams.get("lat"),
      request.nextUrl.searchParams.get("lon")
    );
    if (!coords) return jsonError("latitude and longitude required", 400);

    const snapshot = await services.weather(coords.lat, coords.lon);
    if (snapshot.status !== "ok") {
      return jsonError("weather unavailable", 502, { reason: snapshot.reason });
    }
    return NextResponse.json(snapshot);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : "Weather fetch failed";
    return jsonError(message, 500);
  }
}
