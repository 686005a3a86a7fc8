import { randomUUID } from "crypto";
import { z } from "zod";
import type { DashboardView, HistoryEntry, Principal } from "@/app/types";
import { finalLocationName, resolveLocation } from "@/lib/location";
import { renderMarkdown, renderSections } from "@/lib/markdown";
import { parseCropPlan } from "@/lib/plan";
import { buildCropPrompt } from "@/lib/prompt";
import type { Services } from "@/lib/services";

export const MISSING_FIELDS_ERROR = "Please fill in both crop and land size.";

// Anything other than a string or number is treated as "not reported".
const coordinate = z.union([z.string(), z.number()]).nullish().catch(null);

export const DashboardForm = z.object({
  crop: z.string().trim().min(1, "Crop is required"),
  landSize: z.string().trim().min(1, "Land size is required"),
  cityName: z.string().nullish(),
  latitude: coordinate,
  longitude: coordinate,
});

export type DashboardOutcome =
  | { ok: true; view: DashboardView }
  | { ok: false; error: string; fieldErrors: Record<string, string[] | undefined> };

export async function loadDashboard(principal: Principal, services: Services): Promise<DashboardView> {
  const history = await services.histories.list(principal.username);
  return buildView(principal, history, history[0] ?? null, services);
}

function buildView(
  principal: Principal,
  history: HistoryEntry[],
  activeResult: HistoryEntry | null,
  services: Services
): DashboardView {
  return {
    activeResult,
    history,
    farmName: principal.farmName,
    username: principal.username,
    weather: activeResult?.weather ?? null,
    defaultLocation: services.fallback,
  };
}

/**
 * One dashboard submission: location → weather → prompt → Gemini → Markdown
 * → history. Upstream failures are recorded on the entry, never thrown.
 */
export async function runDashboard(
  principal: Principal,
  form: unknown,
  services: Services
): Promise<DashboardOutcome> {
  const parsed = DashboardForm.safeParse(form);
  if (!parsed.success) {
    return { ok: false, error: MISSING_FIELDS_ERROR, fieldErrors: parsed.error.flatten().fieldErrors };
  }
  const { crop, landSize, cityName, latitude, longitude } = parsed.data;

  const resolved = resolveLocation({ cityName, latitude, longitude }, services.fallback);
  const weather = await services.weather(resolved.lat, resolved.lon);
  const locationName = finalLocationName(resolved, weather);

  const prompt = buildCropPrompt({ crop, landSize, locationName, weather });
  const ai = await services.insights.generate(prompt);

  const base = {
    id: randomUUID(),
    crop,
    landSize,
    locationName,
    latitude: resolved.lat,
    longitude: resolved.lon,
    usedFallback: resolved.usedFallback,
    weather,
    createdAt: new Date().toISOString(),
  };

  let entry: HistoryEntry;
  if (ai.ok) {
    const plan = parseCropPlan(ai.text);
    entry = {
      ...base,
      summary: plan.summary,
      insightsMarkdown: plan.markdown,
      insightsHtml: renderMarkdown(plan.markdown),
      sectionsHtml: renderSections(plan.sections),
      error: null,
    };
  } else {
    entry = {
      ...base,
      summary: {},
      insightsMarkdown: "",
      insightsHtml: "",
      sectionsHtml: {},
      error: ai.error,
    };
  }

  const history = await services.histories.prepend(principal.username, entry);
  console.info(
    `[Dashboard] ${principal.username}: ${crop} @ ${locationName}` +
      ` (weather ${weather.status}, ai ${ai.ok ? "ok" : "failed"})`
  );
  return { ok: true, view: buildView(principal, history, entry, services) };
}
