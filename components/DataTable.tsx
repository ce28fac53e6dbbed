"use client";

import type { ReactNode } from "react";
import type { FixtureRow, StandingRow } from "@/types/league";

export interface Column<T> {
  key: string;
  label: string;
  /** Intitulé complet (infobulle) */
  title?: string;
  align?: "left" | "right" | "center";
  render: (row: T) => ReactNode;
}

interface DataTableProps<T> {
  columns: Column<T>[];
  rows: T[];
  getRowKey: (row: T, index: number) => string;
  caption?: string;
}

const ALIGN_CLASS = { left: "text-left", right: "text-right", center: "text-center" } as const;

export function formatInteger(value: number | null): string {
  return value == null ? "—" : value.toLocaleString("fr-FR");
}

function formatSigned(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

export function DataTable<T>({ columns, rows, getRowKey, caption }: DataTableProps<T>) {
  return (
    <div className="overflow-x-auto rounded-xl border border-[#1F4641]">
      <table className="w-full min-w-max border-collapse text-sm">
        {caption && <caption className="sr-only">{caption}</caption>}
        <thead className="bg-[#0F2F2B] text-[#9CA3AF]">
          <tr>
            {columns.map((col) => (
              <th
                key={col.key}
                scope="col"
                title={col.title}
                className={`px-3 py-2 font-medium ${ALIGN_CLASS[col.align ?? "left"]}`}
              >
                {col.label}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, i) => (
            <tr key={getRowKey(row, i)} className="border-t border-[#1F4641] odd:bg-[#0A1F1C] even:bg-[#0F2F2B]/40">
              {columns.map((col) => (
                <td key={col.key} className={`px-3 py-1.5 text-[#F9FAFB] ${ALIGN_CLASS[col.align ?? "left"]}`}>
                  {col.render(row)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

export const STANDINGS_TABLE_COLUMNS: Column<StandingRow>[] = [
  { key: "rank", label: "Rg", title: "Rang", align: "right", render: (r) => r.rank },
  { key: "team", label: "Équipe", render: (r) => r.team },
  { key: "matchesPlayed", label: "MJ", title: "Matchs joués", align: "right", render: (r) => r.matchesPlayed },
  { key: "wins", label: "V", title: "Victoires", align: "right", render: (r) => r.wins },
  { key: "draws", label: "N", title: "Nuls", align: "right", render: (r) => r.draws },
  { key: "losses", label: "D", title: "Défaites", align: "right", render: (r) => r.losses },
  { key: "goalsFor", label: "BP", title: "Buts pour", align: "right", render: (r) => r.goalsFor },
  { key: "goalsAgainst", label: "BC", title: "Buts contre", align: "right", render: (r) => r.goalsAgainst },
  { key: "goalDifference", label: "Diff", title: "Différence de buts", align: "right", render: (r) => formatSigned(r.goalDifference) },
  { key: "points", label: "Pts", title: "Points", align: "right", render: (r) => <strong>{r.points}</strong> },
  { key: "attendance", label: "Affluence", align: "right", render: (r) => formatInteger(r.attendance) },
];

export const FIXTURES_TABLE_COLUMNS: Column<FixtureRow>[] = [
  { key: "date", label: "Date", render: (r) => r.date ?? "—" },
  { key: "time", label: "Heure", render: (r) => r.time ?? "—" },
  { key: "homeTeam", label: "Domicile", align: "right", render: (r) => r.homeTeam },
  { key: "score", label: "Score", align: "center", render: (r) => r.score ?? "—" },
  { key: "awayTeam", label: "Extérieur", render: (r) => r.awayTeam },
  { key: "attendance", label: "Affluence", align: "right", render: (r) => formatInteger(r.attendance) },
  { key: "venue", label: "Stade", render: (r) => r.venue ?? "—" },
];
