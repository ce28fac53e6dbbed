"use client";

import type { FixtureRow } from "@/types/league";
import { summarizeFixtures } from "@/lib/charts";
import { formatInteger } from "./DataTable";

interface StatCard {
  label: string;
  value: string;
}

export function FixturesSummaryCards({ rows }: { rows: FixtureRow[] }) {
  const s = summarizeFixtures(rows);
  const cards: StatCard[] = [
    { label: "Matchs joués", value: `${s.played} / ${s.total}` },
    { label: "À venir", value: String(s.upcoming) },
    { label: "Victoires domicile", value: String(s.homeWins) },
    { label: "Matchs nuls", value: String(s.draws) },
    { label: "Victoires extérieur", value: String(s.awayWins) },
    { label: "Buts marqués", value: String(s.totalGoals) },
    { label: "Buts par match", value: s.averageGoals == null ? "—" : s.averageGoals.toFixed(2) },
    { label: "Affluence moyenne", value: formatInteger(s.averageAttendance) },
  ];

  return (
    <dl className="grid grid-cols-2 gap-3 sm:grid-cols-4">
      {cards.map((c) => (
        <div key={c.label} className="rounded-xl border border-[#1F4641] bg-[#0F2F2B] p-4">
          <dt className="text-xs text-[#9CA3AF]">{c.label}</dt>
          <dd className="mt-1 text-xl font-semibold text-[#F9FAFB]">{c.value}</dd>
        </div>
      ))}
    </dl>
  );
}
