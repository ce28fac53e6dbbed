"use client";

import type { DataType } from "@/types/league";
import { getDataTypeLabel, getLeagueByName } from "@/lib/league-config";

interface LeagueHeaderProps {
  league: string;
  season: string;
  dataType: DataType;
  /** Date de récupération (ISO) */
  fetchedAt?: string;
}

function formatFetchedAt(iso: string): string | null {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return null;
  return d.toLocaleString("fr-FR", { dateStyle: "short", timeStyle: "short" });
}

export function LeagueHeader({ league, season, dataType, fetchedAt }: LeagueHeaderProps) {
  const config = getLeagueByName(league);
  const fetched = fetchedAt ? formatFetchedAt(fetchedAt) : null;

  return (
    <div className="flex flex-wrap items-center gap-3">
      {config && (
        <img
          src={`https://flagcdn.com/w40/${config.countryCode}.png`}
          alt=""
          width={32}
          height={24}
          className="inline-block h-6 w-8 shrink-0 rounded-sm object-cover"
        />
      )}
      <h2 className="text-xl font-bold tracking-tight text-[#F9FAFB]">
        {`${league} ${getDataTypeLabel(dataType)} - Saison ${season}`}
      </h2>
      {fetched && <span className="text-xs text-[#6B7280]">Mis à jour le {fetched}</span>}
    </div>
  );
}
