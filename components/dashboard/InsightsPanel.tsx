import React from "react";
import type { PlanSections } from "@/app/types";
import { orderedSections } from "@/lib/plan";

interface InsightsPanelProps {
  html: string;
  sectionsHtml: PlanSections;
  error: string | null;
  loading: boolean;
}

// `html` and `sectionsHtml` come from renderMarkdown, which drops raw HTML and sanitizes the rest.
export default function InsightsPanel({ html, sectionsHtml, error, loading }: InsightsPanelProps) {
  const sections = orderedSections(sectionsHtml);

  return (
    <div className="rounded-xl border border-slate-200 bg-white p-6 shadow-sm animate-in fade-in slide-in-from-bottom-2 duration-500">
      <div className="mb-4 flex items-center justify-between border-b border-slate-100 pb-2">
        <h3 className="text-sm font-bold uppercase tracking-wider text-slate-500">
          Crop Plan
        </h3>
        <span className="rounded-full bg-slate-100 px-2 py-0.5 text-[10px] font-semibold text-slate-600">
          Source: Gemini
        </span>
      </div>

      {loading ? (
        <p className="text-sm text-slate-500">Generating recommendations...</p>
      ) : error ? (
        <div role="alert" className="rounded-lg border border-red-200 bg-red-50 p-4 text-sm font-medium text-red-700">
          {error}
        </div>
      ) : sections.length > 0 ? (
        <div className="space-y-4">
          {sections.map((s) => (
            <section
              key={s.key}
              className="plan-html rounded-lg border border-slate-100 bg-slate-50/60 p-4"
              dangerouslySetInnerHTML={{ __html: s.content }}
            />
          ))}
        </div>
      ) : html ? (
        <div className="plan-html" dangerouslySetInnerHTML={{ __html: html }} />
      ) : (
        <p className="text-sm text-slate-500">
          Submit a crop to get a location-aware season plan.
        </p>
      )}
    </div>
  );
}
