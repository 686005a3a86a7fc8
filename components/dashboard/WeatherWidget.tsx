import React from 'react';
import type { WeatherSnapshot } from '@/app/types';

interface WeatherWidgetProps {
    weather: WeatherSnapshot | null;
    loading: boolean;
    error: string;
    locationStatus: string;
    onGpsClick: () => void;
}

function reading(value: number | null, unit: string) {
    return value === null ? "N/A" : `${value}${unit}`;
}

export default function WeatherWidget({
    weather,
    loading,
    error,
    locationStatus,
    onGpsClick,
}: WeatherWidgetProps) {
    return (
        <div className="rounded-xl border border-emerald-100 bg-white p-5 shadow-sm h-full flex flex-col">
            <div className="flex items-start gap-4 mb-4">
                <div className="p-3 bg-emerald-50 rounded-lg text-2xl">📍</div>
                <div className="flex-1 min-w-0">
                    <h3 className="text-sm font-bold uppercase tracking-wider text-slate-500 mb-1">
                        Location & Weather
                    </h3>
                    <div className="font-semibold text-slate-800 truncate text-lg">
                        {loading ? "Fetching weather..." : locationStatus}
                    </div>
                    {weather && (
                        <div className="text-xs text-slate-500 mt-1">
                            Updated {new Date(weather.fetchedAt).toLocaleTimeString()}
                        </div>
                    )}
                    {error && <div className="text-sm text-red-600 mt-1">{error}</div>}
                </div>
            </div>

            {weather?.status === "ok" && (
                <div className="grid grid-cols-2 gap-4 mb-5 p-4 bg-slate-50 rounded-lg">
                    <div>
                        <div className="text-xs text-slate-500 uppercase font-semibold">Temperature</div>
                        <div className="text-xl font-bold text-slate-800">{reading(weather.tempC, "°C")}</div>
                    </div>
                    <div>
                        <div className="text-xs text-slate-500 uppercase font-semibold">Conditions</div>
                        <div className="flex items-center gap-1 text-lg font-medium text-slate-700">
                            {weather.icon && (
                                // eslint-disable-next-line @next/next/no-img-element
                                <img
                                    src={`https://openweathermap.org/img/wn/${weather.icon}.png`}
                                    alt=""
                                    width={28}
                                    height={28}
                                />
                            )}
                            {weather.conditions || "N/A"}
                        </div>
                    </div>
                    <div>
                        <div className="text-xs text-slate-500 uppercase font-semibold">Wind</div>
                        <div className="text-lg font-medium text-slate-700">{reading(weather.windSpeed, " m/s")}</div>
                    </div>
                    <div>
                        <div className="text-xs text-slate-500 uppercase font-semibold">Humidity</div>
                        <div className="text-lg font-medium text-slate-700">{reading(weather.humidity, "%")}</div>
                    </div>
                </div>
            )}

            {weather?.status === "unavailable" && (
                <div className="mb-5 rounded-lg bg-slate-50 p-4 text-sm text-slate-500">
                    Weather data unavailable
                </div>
            )}

            <div className="mt-auto">
                <button
                    onClick={onGpsClick}
                    className="w-full rounded-lg border border-slate-200 bg-white px-4 py-2 text-sm font-semibold text-slate-600 transition hover:bg-slate-50 hover:text-emerald-700"
                    title="Use my location"
                >
                    Use my location (GPS)
                </button>
            </div>
        </div>
    );
}
