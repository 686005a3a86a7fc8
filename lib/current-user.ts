import { cookies } from "next/headers";
import type { Principal } from "@/app/types";
import { resolvePrincipal } from "@/lib/auth";
import { getServices } from "@/lib/services";
import { SESSION_COOKIE } from "@/lib/session";

/** Signed-in caller for server components. */
export function currentPrincipal(): Promise<Principal | null> {
  return resolvePrincipal(cookies().get(SESSION_COOKIE)?.value, getServices());
}
