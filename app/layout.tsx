import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "AgroPulse: Crop Timing Guidance",
  description:
    "Market-timed sowing windows, weather checklists and care-to-harvest timelines from live weather and Gemini.",
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body className="min-h-screen bg-emerald-50/40 antialiased">{children}</body>
    </html>
  );
}
