"use client";

import React, { useState } from 'react';
import Link from 'next/link';
import { useRouter } from 'next/navigation';

interface AuthFormProps {
    mode: "login" | "register";
}

export default function AuthForm({ mode }: AuthFormProps) {
    const router = useRouter();
    const [farmName, setFarmName] = useState("");
    const [username, setUsername] = useState("");
    const [password, setPassword] = useState("");
    const [error, setError] = useState("");
    const [loading, setLoading] = useState(false);

    const isRegister = mode === "register";
    const inputClass = "w-full rounded-lg border border-slate-200 bg-slate-50 px-3 py-2 text-sm focus:border-emerald-500 focus:ring-emerald-500 outline-none transition-colors";

    const handleSubmit = async (e: React.FormEvent) => {
        e.preventDefault();
        setLoading(true);
        setError("");
        try {
            const res = await fetch(isRegister ? "/api/auth/register" : "/api/auth/login", {
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body: JSON.stringify(isRegister ? { farmName, username, password } : { username, password }),
            });
            const data = await res.json();
            if (!res.ok) throw new Error(data.error || "Request failed");

            if (isRegister) {
                router.push("/login?notice=registered");
            } else {
                router.push("/dashboard");
                router.refresh();
            }
        } catch (e: unknown) {
            setError(e instanceof Error ? e.message : "Request failed");
        } finally {
            setLoading(false);
        }
    };

    return (
        <form onSubmit={handleSubmit} className="space-y-4 rounded-xl border border-slate-200 bg-white p-6 shadow-sm">
            <h2 className="text-sm font-bold uppercase tracking-wider text-slate-400 border-b border-slate-100 pb-2">
                {isRegister ? "Create your farm account" : "Log in"}
            </h2>

            {isRegister && (
                <div>
                    <label htmlFor="farmName" className="block text-xs font-semibold text-slate-600 mb-1">Farm name</label>
                    <input
                        id="farmName"
                        value={farmName}
                        onChange={(e) => setFarmName(e.target.value)}
                        placeholder="GreenAcre"
                        className={inputClass}
                    />
                </div>
            )}

            <div>
                <label htmlFor="username" className="block text-xs font-semibold text-slate-600 mb-1">Username</label>
                <input
                    id="username"
                    autoComplete="username"
                    value={username}
                    onChange={(e) => setUsername(e.target.value)}
                    required
                    className={inputClass}
                />
            </div>

            <div>
                <label htmlFor="password" className="block text-xs font-semibold text-slate-600 mb-1">Password</label>
                <input
                    id="password"
                    type="password"
                    autoComplete={isRegister ? "new-password" : "current-password"}
                    value={password}
                    onChange={(e) => setPassword(e.target.value)}
                    required
                    className={inputClass}
                />
            </div>

            {error && (
                <div className="rounded-lg border border-red-200 bg-red-50 p-3 text-sm font-medium text-red-700">
                    {error}
                </div>
            )}

            <button
                type="submit"
                disabled={loading}
                className="w-full rounded-lg bg-emerald-600 px-6 py-3 text-sm font-semibold text-white shadow-sm hover:bg-emerald-700 transition-all disabled:opacity-50"
            >
                {loading ? "Please wait..." : isRegister ? "Create account" : "Log in"}
            </button>

            <p className="text-center text-xs text-slate-500">
                {isRegister ? (
                    <>Already registered? <Link href="/login" className="font-semibold text-emerald-700">Log in</Link></>
                ) : (
                    <>New here? <Link href="/register" className="font-semibold text-emerald-700">Create an account</Link></>
                )}
            </p>
        </form>
    );
}
