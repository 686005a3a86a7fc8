import { z } from "zod";
import type { PlanSections, PlanSummary, SectionKey } from "@/app/types";

export interface CropPlan {
  summary: PlanSummary;
  sections: PlanSections;
  markdown: string;
  rawText: string;
}

// Model-facing snake_case keys → our field names, in display order.
const SUMMARY_KEYS: ReadonlyArray<[string, keyof PlanSummary]> = [
  ["optimal_planting_date", "optimalPlantingDate"],
  ["expected_harvest_date", "expectedHarvestDate"],
  ["expected_market_price_inr", "expectedMarketPriceInr"],
  ["irrigation_method", "irrigationMethod"],
  ["watering_frequency", "wateringFrequency"],
];

const SECTION_KEYS: ReadonlyArray<[string, Exclude<SectionKey, "complete">]> = [
  ["market_timed", "marketTimed"],
  ["weather_soil", "weatherSoil"],
  ["demand_outlook", "demandOutlook"],
  ["timeline", "timeline"],
  ["actions", "actions"],
];

const SECTION_ORDER: SectionKey[] = [...SECTION_KEYS.map(([, key]) => key), "complete"];

const PlanPayload = z.object({
  summary: z.record(z.unknown()).catch({}),
  sections: z.record(z.unknown()).catch({}),
});

/** Strips code fences and surrounding prose, leaving the outermost {...}. */
export function extractJsonText(text: string): string {
  let json = text;
  const fence = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  if (fence && fence[1].trim()) json = fence[1].trim();

  const start = json.indexOf("{");
  const end = json.lastIndexOf("}");
  if (start !== -1 && end > start) json = json.slice(start, end + 1);
  return json;
}

function pickStrings<K extends string>(
  source: Record<string, unknown>,
  keys: ReadonlyArray<[string, K]>
): Partial<Record<K, string>> {
  const out: Partial<Record<K, string>> = {};
  for (const [wire, key] of keys) {
    const value = source[wire];
    if (typeof value === "string" && value.trim()) out[key] = value;
  }
  return out;
}

function unescape(value: string): string {
  return value.replace(/\\n/g, "\n").replace(/\\"/g, '"');
}

function matchField(text: string, wire: string): string | undefined {
  const re = new RegExp(`"${wire}"\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`, "i");
  const m = re.exec(text);
  return m ? unescape(m[1]) : undefined;
}

function scrapeFields<K extends string>(
  text: string,
  keys: ReadonlyArray<[string, K]>
): Partial<Record<K, string>> {
  const out: Partial<Record<K, string>> = {};
  for (const [wire, key] of keys) {
    const value = matchField(text, wire);
    if (value) out[key] = value;
  }
  return out;
}

function tryParse(json: string): z.infer<typeof PlanPayload> | null {
  try {
    const parsed = PlanPayload.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Non-blank sections in display order. */
export function orderedSections(sections: PlanSections): Array<{ key: SectionKey; content: string }> {
  return SECTION_ORDER.flatMap((key) => {
    const content = sections[key];
    return content && content.trim() ? [{ key, content }] : [];
  });
}

export function combineSections(sections: PlanSections): string {
  return orderedSections(sections)
    .map((s) => s.content)
    .join("\n\n");
}

/**
 * Recovers the summary block and the five Markdown sections from model output.
 * Falls back to field-by-field extraction when the JSON does not parse, and to
 * the raw text when nothing structured is found.
 */
export function parseCropPlan(text: string): CropPlan {
  const payload = tryParse(extractJsonText(text));

  let summary: PlanSummary;
  let sections: PlanSections;
  if (payload) {
    summary = pickStrings(payload.summary, SUMMARY_KEYS);
    sections = pickStrings(payload.sections, SECTION_KEYS);
    if (Object.keys(summary).length === 0) summary = scrapeFields(text, SUMMARY_KEYS);
  } else {
    summary = scrapeFields(text, SUMMARY_KEYS);
    sections = scrapeFields(text, SECTION_KEYS);
  }

  if (Object.keys(sections).length === 0 && !payload) {
    sections = { complete: text };
  }

  const markdown = combineSections(sections) || text;
  return { summary, sections, markdown, rawText: text };
}
