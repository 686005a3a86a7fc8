import React from 'react';
import type { HistoryEntry, PlanSummary } from '@/app/types';
import InsightsPanel from './InsightsPanel';

interface ResultsPanelProps {
    result: HistoryEntry;
    loading: boolean;
}

const SUMMARY_CARDS: Array<{ key: keyof PlanSummary; label: string; accent: string }> = [
    { key: "optimalPlantingDate", label: "Plant On", accent: "text-emerald-700" },
    { key: "expectedHarvestDate", label: "Harvest By", accent: "text-slate-700" },
    { key: "expectedMarketPriceInr", label: "Expected Price", accent: "text-amber-600" },
    { key: "irrigationMethod", label: "Irrigation", accent: "text-sky-700" },
    { key: "wateringFrequency", label: "Watering", accent: "text-sky-700" },
];

function weatherLine(result: HistoryEntry): string {
    const w = result.weather;
    if (w.status !== "ok") return "Weather data unavailable";
    const parts = [
        w.tempC !== null ? `${w.tempC}°C` : null,
        w.humidity !== null ? `humidity ${w.humidity}%` : null,
        w.conditions || null,
    ].filter(Boolean);
    return parts.length ? parts.join(", ") : "Weather data unavailable";
}

export default function ResultsPanel({ result, loading }: ResultsPanelProps) {
    const cards = SUMMARY_CARDS.filter((c) => result.summary[c.key]);

    return (
        <div id="results-section" className="space-y-6 animate-in fade-in slide-in-from-bottom-4 duration-500">

            {/* Context Banner */}
            <div className="rounded-xl bg-emerald-700 p-6 text-white shadow-md">
                <div className="text-sm font-medium opacity-80 uppercase tracking-wide mb-1">
                    {result.landSize} · {result.locationName}
                </div>
                <div className="text-3xl font-extrabold tracking-tight">{result.crop}</div>
                <p className="mt-2 text-base font-medium text-white/90">
                    {weatherLine(result)}
                    {result.usedFallback && " (default location)"}
                </p>
                <p className="mt-1 text-xs text-white/70">
                    {new Date(result.createdAt).toLocaleString()}
                </p>
            </div>

            {/* Summary Cards */}
            {cards.length > 0 && (
                <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-5">
                    {cards.map((c) => (
                        <div key={c.key} className="metric-card bg-white hover:border-emerald-300 transition-colors">
                            <div className="label">{c.label}</div>
                            <div className={`value ${c.accent}`}>{result.summary[c.key]}</div>
                        </div>
                    ))}
                </div>
            )}

            <InsightsPanel
                html={result.insightsHtml}
                sectionsHtml={result.sectionsHtml}
                error={result.error}
                loading={loading}
            />
        </div>
    );
}
