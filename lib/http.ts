import { NextResponse, type NextRequest } from "next/server";
import type { Principal } from "@/app/types";
import { resolvePrincipal } from "@/lib/auth";
import type { Services } from "@/lib/services";
import { SESSION_COOKIE } from "@/lib/session";

export function jsonError(error: string, status: number, extra: Record<string, unknown> = {}) {
  return NextResponse.json({ error, ...extra }, { status });
}

export function unauthorized() {
  return jsonError("Authentication required", 401);
}

/** The signed-in caller for this request, or null. */
export function principalFrom(request: NextRequest, services: Services): Promise<Principal | null> {
  return resolvePrincipal(request.cookies.get(SESSION_COOKIE)?.value, services);
}

export async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    return null;
  }
}
