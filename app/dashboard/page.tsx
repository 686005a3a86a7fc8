import { redirect } from "next/navigation";
import DashboardClient from "@/components/dashboard/DashboardClient";
import { currentPrincipal } from "@/lib/current-user";
import { loadDashboard } from "@/lib/dashboard";
import { getServices } from "@/lib/services";

export const dynamic = "force-dynamic";

export default async function DashboardPage() {
  const principal = await currentPrincipal();
  if (!principal) redirect("/login?notice=login-required");

  const view = await loadDashboard(principal, getServices());
  return <DashboardClient initialView={view} />;
}
