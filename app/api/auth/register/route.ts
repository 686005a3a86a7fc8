import { NextResponse } from "next/server";
import { register } from "@/lib/auth";
import { jsonError, readJson } from "@/lib/http";
import { getServices } from "@/lib/services";

export async function POST(request: Request) {
  try {
    const result = await register(await readJson(request), getServices());
    if (!result.ok) return jsonError(result.error, result.status);
    return NextResponse.json(
      { username: result.value.username, message: "Account created! Please log in 🌱" },
      { status: 201 }
    );
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : "Registration failed";
    return jsonError(message, 500);
  }
}
