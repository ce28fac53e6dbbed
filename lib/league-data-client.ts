/**
 * Client navigateur de /api/league-data
 */

import type { DataType, LeagueDataResult, LeagueDataSuccess } from "@/types/league";
import { isDataType } from "./league-config";

export interface LeagueDataQuery {
  league: string;
  season: string;
  dataType: DataType;
}

export function buildLeagueDataUrl(query: LeagueDataQuery): string {
  const params = new URLSearchParams({
    league: query.league,
    season: query.season,
    type: query.dataType,
  });
  return `/api/league-data?${params.toString()}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isLeagueDataSuccess(value: unknown): value is LeagueDataSuccess {
  return (
    isRecord(value) &&
    value.ok === true &&
    isDataType(value.dataType) &&
    Array.isArray(value.rows) &&
    typeof value.season === "string" &&
    typeof value.league === "string"
  );
}

export async function fetchLeagueData(query: LeagueDataQuery, signal?: AbortSignal): Promise<LeagueDataResult> {
  const res = await fetch(buildLeagueDataUrl(query), { signal });
  const data: unknown = await res.json().catch(() => null);
  if (res.ok && isLeagueDataSuccess(data)) return data;
  const error = isRecord(data) && typeof data.error === "string" ? data.error : `HTTP ${res.status}`;
  return { ok: false, error };
}
