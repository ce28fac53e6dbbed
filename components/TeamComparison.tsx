"use client";

import { useMemo, useState } from "react";
import type { StandingRow } from "@/types/league";
import { buildTeamComparison, pickDefaultComparison } from "@/lib/charts";
import { TeamRadarChart } from "./TeamRadarChart";
import { EmptyState } from "./EmptyState";

const selectClass =
  "w-full rounded-lg border border-[#1F4641] bg-[#0A1F1C] px-3 py-2 text-[#F9FAFB] focus:border-emerald-500/50 focus:outline-none";

/**
 * Comparaison radar de 2 équipes, par défaut les 2 premières du classement.
 * Le parent remonte le composant (key) quand le classement change.
 */
export function TeamComparison({ rows }: { rows: StandingRow[] }) {
  const defaults = useMemo(() => pickDefaultComparison(rows), [rows]);
  const [team1, setTeam1] = useState(defaults?.[0] ?? "");
  const [team2, setTeam2] = useState(defaults?.[1] ?? "");

  const teams = useMemo(() => Array.from(new Set(rows.map((r) => r.team))), [rows]);
  const comparison = useMemo(() => buildTeamComparison(rows, team1, team2), [rows, team1, team2]);

  if (!defaults) {
    return (
      <EmptyState
        icon="⚖️"
        title="Comparaison indisponible"
        description="Il faut au moins deux équipes au classement."
      />
    );
  }

  return (
    <div className="space-y-4">
      <div className="grid gap-4 sm:grid-cols-2">
        <div>
          <label htmlFor="compare-team-1" className="mb-1 block text-sm text-[#9CA3AF]">
            Première équipe
          </label>
          <select id="compare-team-1" value={team1} onChange={(e) => setTeam1(e.target.value)} className={selectClass}>
            {teams.map((t) => (
              <option key={t} value={t}>
                {t}
              </option>
            ))}
          </select>
        </div>
        <div>
          <label htmlFor="compare-team-2" className="mb-1 block text-sm text-[#9CA3AF]">
            Deuxième équipe
          </label>
          <select id="compare-team-2" value={team2} onChange={(e) => setTeam2(e.target.value)} className={selectClass}>
            {teams.map((t) => (
              <option key={t} value={t}>
                {t}
              </option>
            ))}
          </select>
        </div>
      </div>
      {comparison && <TeamRadarChart comparison={comparison} />}
    </div>
  );
}
