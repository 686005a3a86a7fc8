export interface FormState {
  crop: string;
  landSize: string;
  cityName: string;
}

export interface WeatherInfo {
  status: "ok";
  city: string;
  tempC: number | null;      // °C, metric units
  humidity: number | null;   // %
  conditions: string;        // title-cased provider description
  icon: string | null;       // provider icon code, e.g. "10d"
  windSpeed: number | null;  // m/s
  latitude: number;
  longitude: number;
  fetchedAt: string;         // ISO timestamp
}

export interface WeatherUnavailable {
  status: "unavailable";
  reason: string;
  fetchedAt: string;
}

export type WeatherSnapshot = WeatherInfo | WeatherUnavailable;

export interface PlanSummary {
  optimalPlantingDate?: string;
  expectedHarvestDate?: string;
  expectedMarketPriceInr?: string;
  irrigationMethod?: string;
  wateringFrequency?: string;
}

export type SectionKey =
  | "marketTimed"
  | "weatherSoil"
  | "demandOutlook"
  | "timeline"
  | "actions"
  | "complete";

export type PlanSections = Partial<Record<SectionKey, string>>;

export interface HistoryEntry {
  id: string;
  crop: string;
  landSize: string;
  locationName: string;
  latitude: number;
  longitude: number;
  usedFallback: boolean;
  weather: WeatherSnapshot;
  summary: PlanSummary;
  insightsMarkdown: string;
  insightsHtml: string;
  sectionsHtml: PlanSections;
  /** Set when the AI call failed; content fields are then empty. */
  error: string | null;
  createdAt: string;
}

export interface DefaultLocation {
  lat: number;
  lon: number;
  city: string;
}

export interface DashboardView {
  activeResult: HistoryEntry | null;
  history: HistoryEntry[];
  farmName: string;
  username: string;
  weather: WeatherSnapshot | null;
  defaultLocation: DefaultLocation;
}

export interface Principal {
  username: string;
  farmName: string;
}
