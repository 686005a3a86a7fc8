import Link from "next/link";
import Header from "@/components/layout/Header";
import Notice, { noticeFor } from "@/components/layout/Notice";
import { SECTION_HEADERS } from "@/lib/prompt";

interface LandingProps {
  searchParams: { [key: string]: string | string[] | undefined };
}

export default function Landing({ searchParams }: LandingProps) {
  const notice = noticeFor(searchParams.notice);

  return (
    <div className="mx-auto max-w-5xl px-4 py-8 sm:px-6 lg:px-8">
      <Header />
      {notice && <Notice {...notice} />}

      <section className="rounded-2xl border border-emerald-100 bg-white p-8 shadow-sm">
        <h1 className="text-3xl font-extrabold tracking-tight text-slate-900 sm:text-4xl">
          Plant when the weather and the market agree.
        </h1>
        <p className="mt-3 max-w-2xl text-lg text-slate-600">
          Tell AgroPulse what you grow, how much land you have and where it is. It reads the
          current weather for your field and drafts a season plan you can act on.
        </p>
        <div className="mt-6 flex flex-wrap gap-3">
          <Link
            href="/register"
            className="rounded-lg bg-emerald-600 px-6 py-3 text-sm font-semibold text-white shadow-sm hover:bg-emerald-700"
          >
            Get started
          </Link>
          <Link
            href="/dashboard"
            className="rounded-lg border border-slate-200 bg-white px-6 py-3 text-sm font-semibold text-slate-700 hover:bg-slate-50"
          >
            Open dashboard
          </Link>
        </div>
      </section>

      <section className="mt-8 grid gap-4 sm:grid-cols-2 lg:grid-cols-5">
        {SECTION_HEADERS.map((title) => (
          <div key={title} className="metric-card bg-white">
            <div className="label">Every plan covers</div>
            <div className="value text-base">{title}</div>
          </div>
        ))}
      </section>
    </div>
  );
}
