import { NextResponse, type NextRequest } from "next/server";
import { loadDashboard, runDashboard } from "@/lib/dashboard";
import { jsonError, principalFrom, readJson, unauthorized } from "@/lib/http";
import { getServices } from "@/lib/services";

export async function GET(request: NextRequest) {
  try {
    const services = getServices();
    const principal = await principalFrom(request, services);
    if (!principal) return unauthorized();
    return NextResponse.json(await loadDashboard(principal, services));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : "Dashboard unavailable";
    return jsonError(message, 500);
  }
}

/**
 * POST /api/dashboard
 *
 * Runs one advisory: resolve location, fetch weather, ask Gemini, store the
 * rendered plan at the head of the grower's history.
 */
export async function POST(request: NextRequest) {
  try {
    const services = getServices();
    const principal = await principalFrom(request, services);
    if (!principal) return unauthorized();

    const outcome = await runDashboard(principal, await readJson(request), services);
    if (!outcome.ok) {
      return jsonError(outcome.error, 400, { fieldErrors: outcome.fieldErrors });
    }
    return NextResponse.json(outcome.view);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : "Advisory failed";
    return jsonError(message, 500);
  }
}
