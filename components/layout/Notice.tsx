import React from 'react';

type Tone = "success" | "warning" | "info" | "danger";

const NOTICES: Record<string, { text: string; tone: Tone }> = {
    "registered": { text: "Account created! Please log in 🌱", tone: "success" },
    "login-required": { text: "Please log in first ✨", tone: "warning" },
    "signed-out": { text: "Signed out successfully. See you soon!", tone: "info" },
};

const TONE_CLASS: Record<Tone, string> = {
    success: "border-emerald-200 bg-emerald-50 text-emerald-800",
    warning: "border-amber-200 bg-amber-50 text-amber-800",
    info: "border-sky-200 bg-sky-50 text-sky-800",
    danger: "border-red-200 bg-red-50 text-red-700",
};

export function noticeFor(code: string | string[] | undefined) {
    return typeof code === "string" ? NOTICES[code] : undefined;
}

interface NoticeProps {
    text: string;
    tone: Tone;
}

export default function Notice({ text, tone }: NoticeProps) {
    return (
        <div role="status" className={`mb-6 rounded-xl border p-4 text-sm font-medium ${TONE_CLASS[tone]}`}>
            {text}
        </div>
    );
}
