import React from 'react';
import Link from 'next/link';

interface HeaderProps {
    farmName?: string;
    username?: string;
}

export default function Header({ farmName, username }: HeaderProps) {
    return (
        <header className="mb-8 flex flex-col gap-4 sm:flex-row sm:items-center sm:justify-between">
            <Link href="/" className="flex items-center gap-3">
                <span className="inline-flex items-center justify-center rounded-full bg-emerald-100 p-3 text-3xl">🌾</span>
                <span>
                    <span className="block text-3xl font-extrabold tracking-tight text-slate-900">AgroPulse</span>
                    <span className="block text-sm font-medium text-slate-500">
                        {farmName ?? "Crop timing guidance from live weather"}
                    </span>
                </span>
            </Link>
            {username ? (
                <div className="flex items-center gap-3 text-sm">
                    <span className="text-slate-600">Signed in as <b>{username}</b></span>
                    <a
                        href="/logout"
                        className="rounded-lg border border-slate-200 bg-white px-3 py-1.5 font-semibold text-slate-600 transition hover:bg-slate-50"
                    >
                        Log out
                    </a>
                </div>
            ) : (
                <nav className="flex items-center gap-3 text-sm font-semibold">
                    <Link href="/login" className="text-slate-600 hover:text-emerald-700">Log in</Link>
                    <Link href="/register" className="rounded-lg bg-emerald-600 px-3 py-1.5 text-white hover:bg-emerald-700">
                        Create account
                    </Link>
                </nav>
            )}
        </header>
    );
}
