import React from 'react';
import type { FormState } from '@/app/types';

interface InputFormProps {
    form: FormState;
    onChange: (key: keyof FormState, value: string) => void;
    loading: boolean;
    coordsLabel: string;
    onSubmit: () => void;
}

export default function InputForm({
    form,
    onChange,
    loading,
    coordsLabel,
    onSubmit,
}: InputFormProps) {
    const inputClass = "w-full rounded-lg border border-slate-200 bg-slate-50 px-3 py-2 text-sm focus:border-emerald-500 focus:ring-emerald-500 outline-none transition-colors";

    const handleSubmit = (e: React.FormEvent) => {
        e.preventDefault();
        onSubmit();
    };

    return (
        <form onSubmit={handleSubmit} className="rounded-xl border border-slate-200 bg-white p-6 shadow-sm">
            <h2 className="text-sm font-bold uppercase tracking-wider text-slate-400 border-b border-slate-100 pb-2 mb-4">
                Crop Setup
            </h2>

            <div className="grid gap-4 md:grid-cols-3">
                <div>
                    <label htmlFor="crop" className="block text-xs font-semibold text-slate-600 mb-1">Crop</label>
                    <input
                        id="crop"
                        value={form.crop}
                        onChange={(e) => onChange("crop", e.target.value)}
                        placeholder="Tomato"
                        className={inputClass}
                    />
                    <p className="text-[10px] text-slate-400 mt-1">
                        What you are planning to sow.
                    </p>
                </div>
                <div>
                    <label htmlFor="landSize" className="block text-xs font-semibold text-slate-600 mb-1">Land Size</label>
                    <input
                        id="landSize"
                        value={form.landSize}
                        onChange={(e) => onChange("landSize", e.target.value)}
                        placeholder="2 acres"
                        className={inputClass}
                    />
                    <p className="text-[10px] text-slate-400 mt-1">
                        Acres or hectares, with the unit.
                    </p>
                </div>
                <div>
                    <label htmlFor="cityName" className="block text-xs font-semibold text-slate-600 mb-1">City (optional)</label>
                    <input
                        id="cityName"
                        value={form.cityName}
                        onChange={(e) => onChange("cityName", e.target.value)}
                        placeholder="Overrides the place name"
                        className={inputClass}
                    />
                    <p className="text-[10px] text-slate-400 mt-1">
                        Weather still comes from {coordsLabel}.
                    </p>
                </div>
            </div>

            <div className="mt-6 pt-6 border-t border-slate-100">
                <button
                    type="submit"
                    disabled={loading}
                    className="w-full rounded-lg bg-emerald-600 px-6 py-3 text-sm font-semibold text-white shadow-sm hover:bg-emerald-700 hover:shadow-md transition-all active:scale-[0.98] disabled:opacity-50 disabled:active:scale-100"
                >
                    {loading ? (
                        <span className="flex items-center justify-center gap-2">
                            <svg className="animate-spin h-4 w-4 text-white" xmlns="http://www.w3.org/2000/svg" fill="none" viewBox="0 0 24 24">
                                <circle className="opacity-25" cx="12" cy="12" r="10" stroke="currentColor" strokeWidth="4"></circle>
                                <path className="opacity-75" fill="currentColor" d="M4 12a8 8 0 018-8V0C5.373 0 0 5.373 0 12h4zm2 5.291A7.962 7.962 0 014 12H0c0 3.042 1.135 5.824 3 7.938l3-2.647z"></path>
                            </svg>
                            Drafting your plan...
                        </span>
                    ) : (
                        "Generate Crop Plan"
                    )}
                </button>
            </div>
        </form>
    );
}
