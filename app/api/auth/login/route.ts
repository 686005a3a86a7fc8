import { NextResponse, type NextRequest } from "next/server";
import { login } from "@/lib/auth";
import { jsonError, readJson } from "@/lib/http";
import { getServices } from "@/lib/services";
import { SESSION_COOKIE, sessionCookieOptions } from "@/lib/session";

export async function POST(request: NextRequest) {
  try {
    const result = await login(
      await readJson(request),
      getServices(),
      request.cookies.get(SESSION_COOKIE)?.value
    );
    if (!result.ok) return jsonError(result.error, result.status);

    const { principal, cookieValue } = result.value;
    const response = NextResponse.json({
      username: principal.username,
      farmName: principal.farmName,
      message: "Welcome back to AgroPulse!",
    });
    response.cookies.set(SESSION_COOKIE, cookieValue, sessionCookieOptions);
    return response;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : "Login failed";
    return jsonError(message, 500);
  }
}
