import React from 'react';
import type { HistoryEntry } from '@/app/types';

interface HistoryListProps {
    history: HistoryEntry[];
    activeId: string | null;
    onSelect: (entry: HistoryEntry) => void;
}

export default function HistoryList({ history, activeId, onSelect }: HistoryListProps) {
    return (
        <div className="rounded-xl border border-slate-200 bg-white p-6 shadow-sm">
            <h3 className="mb-4 text-sm font-bold uppercase tracking-wider text-slate-400 border-b border-slate-100 pb-2">
                Recent Plans
            </h3>
            {history.length === 0 ? (
                <p className="text-sm text-slate-400">Your last five plans will show up here.</p>
            ) : (
                <ul className="space-y-2">
                    {history.map((entry) => (
                        <li key={entry.id}>
                            <button
                                onClick={() => onSelect(entry)}
                                className={`w-full rounded-lg border p-3 text-left transition-colors ${
                                    entry.id === activeId
                                        ? "border-emerald-300 bg-emerald-50"
                                        : "border-slate-100 bg-slate-50 hover:border-emerald-200"
                                }`}
                            >
                                <div className="flex items-center justify-between">
                                    <span className="text-sm font-semibold text-slate-700">{entry.crop}</span>
                                    {entry.error && <span className="text-[10px] font-semibold text-red-500">failed</span>}
                                </div>
                                <div className="text-[11px] text-slate-400">
                                    {entry.landSize} · {entry.locationName} · {new Date(entry.createdAt).toLocaleString()}
                                </div>
                            </button>
                        </li>
                    ))}
                </ul>
            )}
        </div>
    );
}
