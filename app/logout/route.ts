import { NextResponse, type NextRequest } from "next/server";
import { logout } from "@/lib/auth";
import { getServices } from "@/lib/services";
import { SESSION_COOKIE } from "@/lib/session";

export async function GET(request: NextRequest) {
  await logout(request.cookies.get(SESSION_COOKIE)?.value, getServices());
  const response = NextResponse.redirect(new URL("/?notice=signed-out", request.url));
  response.cookies.delete(SESSION_COOKIE);
  return response;
}
