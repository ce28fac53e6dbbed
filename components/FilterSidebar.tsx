"use client";

import type { DataType } from "@/types/league";
import { DATA_TYPES, LEAGUES, getAvailableSeasons } from "@/lib/league-config";

export interface Filters {
  league: string;
  season: string;
  dataType: DataType;
}

export function getDefaultFilters(): Filters {
  return {
    league: LEAGUES[0].name,
    season: getAvailableSeasons()[0],
    dataType: DATA_TYPES[0].value,
  };
}

interface FilterSidebarProps {
  filters: Filters;
  onChange: (filters: Filters) => void;
}

const selectClass =
  "w-full rounded-lg border border-[#1F4641] bg-[#0A1F1C] px-3 py-2 text-[#F9FAFB] focus:border-emerald-500/50 focus:outline-none focus:ring-1 focus:ring-emerald-500/50";

export function FilterSidebar({ filters, onChange }: FilterSidebarProps) {
  const seasons = getAvailableSeasons();

  function handleDataType(value: string) {
    const match = DATA_TYPES.find((d) => d.value === value);
    if (match) onChange({ ...filters, dataType: match.value });
  }

  return (
    <aside className="flex flex-col gap-5 rounded-xl border border-[#1F4641] bg-[#0F2F2B] p-5 lg:w-72 lg:shrink-0">
      <h2 className="text-lg font-bold text-[#F9FAFB]">Filtres</h2>

      <div>
        <label htmlFor="filter-league" className="mb-1 block text-sm text-[#9CA3AF]">
          Championnat
        </label>
        <select
          id="filter-league"
          value={filters.league}
          onChange={(e) => onChange({ ...filters, league: e.target.value })}
          className={selectClass}
        >
          {LEAGUES.map((l) => (
            <option key={l.fbrefId} value={l.name}>
              {l.name}
            </option>
          ))}
        </select>
      </div>

      <div>
        <label htmlFor="filter-season" className="mb-1 block text-sm text-[#9CA3AF]">
          Saison
        </label>
        <select
          id="filter-season"
          value={filters.season}
          onChange={(e) => onChange({ ...filters, season: e.target.value })}
          className={selectClass}
        >
          {seasons.map((s) => (
            <option key={s} value={s}>
              {s}
            </option>
          ))}
        </select>
      </div>

      <div>
        <label htmlFor="filter-data-type" className="mb-1 block text-sm text-[#9CA3AF]">
          Type de données
        </label>
        <select
          id="filter-data-type"
          value={filters.dataType}
          onChange={(e) => handleDataType(e.target.value)}
          className={selectClass}
        >
          {DATA_TYPES.map((d) => (
            <option key={d.value} value={d.value}>
              {d.label}
            </option>
          ))}
        </select>
      </div>

      <hr className="border-[#1F4641]" />
      <p className="rounded-lg bg-sky-500/10 px-3 py-2 text-xs text-sky-300">
        Données issues de fbref.com
      </p>
    </aside>
  );
}
