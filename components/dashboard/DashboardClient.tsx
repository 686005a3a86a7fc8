"use client";

import { useState, useCallback, useEffect } from "react";
import dynamic from "next/dynamic";
import type { DashboardView, FormState, HistoryEntry, WeatherSnapshot } from "@/app/types";
import Header from "@/components/layout/Header";
import WeatherWidget from "@/components/dashboard/WeatherWidget";
import InputForm from "@/components/dashboard/InputForm";
import ResultsPanel from "@/components/dashboard/ResultsPanel";
import HistoryList from "@/components/dashboard/HistoryList";

const LocationMap = dynamic(() => import("@/components/LocationMap"), {
  ssr: false,
  loading: () => (
    <div className="flex h-full min-h-[300px] items-center justify-center rounded-xl bg-slate-50 text-sm text-slate-400 border border-slate-100 animate-pulse">
      Loading map...
    </div>
  ),
});

const emptyForm: FormState = { crop: "", landSize: "", cityName: "" };

interface DashboardClientProps {
  initialView: DashboardView;
}

export default function DashboardClient({ initialView }: DashboardClientProps) {
  const [view, setView] = useState<DashboardView>(initialView);
  const [active, setActive] = useState<HistoryEntry | null>(initialView.activeResult);
  const [form, setForm] = useState<FormState>(emptyForm);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState("");

  // ── Browser location & live weather ────────────────────────────────────
  // null means "not reported": the server falls back to the default location.
  const [coords, setCoords] = useState<{ lat: number; lon: number } | null>(null);
  const [liveWeather, setLiveWeather] = useState<WeatherSnapshot | null>(initialView.weather);
  const [weatherLoading, setWeatherLoading] = useState(false);
  const [weatherError, setWeatherError] = useState("");
  const [locationStatus, setLocationStatus] = useState("Detecting location...");

  const fallback = view.defaultLocation;

  const handleFormChange = useCallback(
    (key: keyof FormState, value: string) =>
      setForm((prev) => ({ ...prev, [key]: value })),
    []
  );

  const fetchWeatherByCoords = useCallback(async (lat: number, lon: number) => {
    setCoords({ lat, lon });
    setWeatherLoading(true);
    setWeatherError("");
    try {
      const res = await fetch(`/api/weather?lat=${lat}&lon=${lon}`);
      const data = await res.json();
      if (!res.ok) throw new Error(data.error || "Weather fetch failed");
      setLiveWeather(data as WeatherSnapshot);
      setLocationStatus(data.city || `${lat.toFixed(2)}, ${lon.toFixed(2)}`);
    } catch (e: unknown) {
      setWeatherError(e instanceof Error ? e.message : "Weather fetch failed");
      setLocationStatus(`${lat.toFixed(2)}, ${lon.toFixed(2)}`);
    } finally {
      setWeatherLoading(false);
    }
  }, []);

  const locate = useCallback(() => {
    if (!navigator.geolocation) {
      setLocationStatus(`Geolocation not supported, using ${fallback.city}`);
      return;
    }
    navigator.geolocation.getCurrentPosition(
      (pos) => void fetchWeatherByCoords(pos.coords.latitude, pos.coords.longitude),
      () => setLocationStatus(`Location denied, using ${fallback.city}`),
      { timeout: 8000 }
    );
  }, [fetchWeatherByCoords, fallback.city]);

  useEffect(() => {
    locate();
  }, [locate]);

  // ── Generate plan ──────────────────────────────────────────────────────
  const submit = useCallback(async () => {
    if (!form.crop.trim() || !form.landSize.trim()) {
      setError("Please fill in both crop and land size.");
      return;
    }
    setLoading(true);
    setError("");
    try {
      const res = await fetch("/api/dashboard", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          crop: form.crop,
          landSize: form.landSize,
          cityName: form.cityName,
          latitude: coords?.lat ?? null,
          longitude: coords?.lon ?? null,
        }),
      });
      const data = await res.json();
      if (res.status === 401) {
        window.location.assign("/login?notice=login-required");
        return;
      }
      if (!res.ok) throw new Error(data.error || "Plan generation failed");

      const next = data as DashboardView;
      setView(next);
      setActive(next.activeResult);

      setTimeout(() => {
        const el = document.getElementById("results-section");
        if (el) el.scrollIntoView({ behavior: "smooth", block: "start" });
      }, 100);
    } catch (e: unknown) {
      setError(e instanceof Error ? e.message : "Unknown error");
    } finally {
      setLoading(false);
    }
  }, [form, coords]);

  const mapLat = coords?.lat ?? active?.latitude ?? fallback.lat;
  const mapLon = coords?.lon ?? active?.longitude ?? fallback.lon;
  const coordsLabel = coords ? "your pinned location" : `the default location (${fallback.city})`;

  return (
    <div className="min-h-screen pb-20">
      <div className="mx-auto max-w-7xl px-4 py-8 sm:px-6 lg:px-8">

        <Header farmName={view.farmName} username={view.username} />

        {/* ── Map & Weather ───────────────────────────────────────────── */}
        <div className="no-print mb-8 grid gap-6 lg:grid-cols-[2fr_1fr]">
          <div className="order-2 lg:order-1 h-[360px] rounded-xl border border-slate-200 shadow-sm overflow-hidden bg-white">
            <LocationMap
              lat={mapLat}
              lon={mapLon}
              label={locationStatus}
              onPick={(lat, lon) => void fetchWeatherByCoords(lat, lon)}
            />
          </div>
          <div className="order-1 lg:order-2">
            <WeatherWidget
              weather={liveWeather}
              loading={weatherLoading}
              error={weatherError}
              locationStatus={locationStatus}
              onGpsClick={locate}
            />
          </div>
        </div>

        <div className="no-print mb-10">
          <InputForm
            form={form}
            onChange={handleFormChange}
            loading={loading}
            coordsLabel={coordsLabel}
            onSubmit={() => void submit()}
          />
        </div>

        {error && (
          <div className="no-print mb-8 rounded-xl border border-red-200 bg-red-50 p-4 flex items-center gap-3">
            <div className="text-red-500">❌</div>
            <div className="text-sm font-medium text-red-700">{error}</div>
          </div>
        )}

        <div className="grid gap-8 lg:grid-cols-[2fr_1fr]">
          <div>
            {active ? (
              <ResultsPanel result={active} loading={loading} />
            ) : (
              <div className="rounded-xl border border-dashed border-slate-300 bg-white p-10 text-center text-sm text-slate-400">
                No plans yet. Enter a crop and land size to get started.
              </div>
            )}
          </div>
          <HistoryList history={view.history} activeId={active?.id ?? null} onSelect={setActive} />
        </div>

      </div>
    </div>
  );
}
