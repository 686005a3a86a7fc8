import type { WeatherSnapshot } from "@/app/types";
import { describeWeather } from "@/lib/weather";

export const SECTION_HEADERS = [
  "Market-Timed Sowing Window",
  "Weather & Soil Checklist",
  "Demand Outlook & Alternatives",
  "Care-to-Harvest Timeline",
  "Action Notes",
] as const;

export interface CropPromptInput {
  crop: string;
  landSize: string;
  locationName: string;
  weather: WeatherSnapshot;
}

/**
 * Builds the crop-timing prompt. The model is asked for a single JSON object
 * whose `sections` hold the five Markdown sections in a fixed order.
 */
export function buildCropPrompt({ crop, landSize, locationName, weather }: CropPromptInput): string {
  const weatherLine = describeWeather(weather, locationName);

  return `You are AgroPulse, an elite agronomy strategist. Given:
- Crop: ${crop}
- Land size (acres or hectares): ${landSize}
- Location: ${locationName}
- ${weatherLine}

You MUST respond with ONLY valid JSON (no markdown code blocks, no explanations, no trailing text). The JSON structure must be:
{
  "summary": {
    "optimal_planting_date": "May 15, 2026",
    "expected_harvest_date": "Aug 23, 2026",
    "expected_market_price_inr": "₹1,04,000 per ton",
    "irrigation_method": "Drip irrigation",
    "watering_frequency": "Every 3-4 days"
  },
  "sections": {
    "market_timed": "## ${SECTION_HEADERS[0]}\\nYour detailed explanation here...",
    "weather_soil": "## ${SECTION_HEADERS[1]}\\n- Point 1\\n- Point 2",
    "demand_outlook": "## ${SECTION_HEADERS[2]}\\nYour analysis here...",
    "timeline": "## ${SECTION_HEADERS[3]}\\n- **Date:** Task description",
    "actions": "## ${SECTION_HEADERS[4]}\\n1. Action item 1\\n2. Action item 2"
  }
}

CRITICAL: Return ONLY the JSON object, nothing else.
- Every section MUST start with its "## " header exactly as shown above.
- Summary values: concise, human-readable dates and prices in Indian format
- expected_market_price_inr: must include ₹ symbol and unit (per ton/quintal/kg)
- Sections: Use \\n for newlines within strings, keep under 220 words total`;
}
