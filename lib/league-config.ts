/**
 * Configuration des championnats - mapping vers les compétitions fbref
 * fbrefId = identifiant de compétition dans les URLs fbref (/en/comps/{id}/...)
 */

import type { DataType } from "@/types/league";

export interface LeagueConfig {
  /** Nom affiché (et utilisé dans les URLs fbref) */
  name: string;
  /** ID de compétition fbref */
  fbrefId: string;
  /** Nom au format URL ("Premier-League") */
  slug: string;
  /** Code pays flagcdn (gb-eng, es, de, it, fr) */
  countryCode: string;
}

function league(name: string, fbrefId: string, countryCode: string): LeagueConfig {
  return { name, fbrefId, slug: name.replace(/ /g, "-"), countryCode };
}

export const LEAGUES: readonly LeagueConfig[] = [
  league("Premier League", "9", "gb-eng"),
  league("La Liga", "12", "es"),
  league("Bundesliga", "20", "de"),
  league("Serie A", "11", "it"),
  league("Ligue 1", "13", "fr"),
];

export function getLeagueByName(name: string | null | undefined): LeagueConfig | undefined {
  if (name == null) return undefined;
  const key = name.trim();
  return LEAGUES.find((l) => l.name === key);
}

export function getLeagueById(fbrefId: number | string | null | undefined): LeagueConfig | undefined {
  if (fbrefId == null || fbrefId === "") return undefined;
  const key = String(fbrefId).trim();
  return LEAGUES.find((l) => l.fbrefId === key);
}

/** Saisons disponibles sur fbref pour les 5 grands championnats */
const FIRST_SEASON_START = 2010;
const LAST_SEASON_START = 2023;

export interface Season {
  label: string;
  startYear: number;
  endYear: number;
}

/**
 * Saisons proposées dans les filtres, la plus récente en premier.
 */
export function getAvailableSeasons(): string[] {
  const seasons: string[] = [];
  for (let year = LAST_SEASON_START; year >= FIRST_SEASON_START; year--) {
    seasons.push(`${year}-${year + 1}`);
  }
  return seasons;
}

export function parseSeason(label: string): Season {
  const parts = label.trim().split("-");
  if (parts.length !== 2 || !parts.every((p) => /^\d{4}$/.test(p))) {
    throw new Error(`Saison invalide : ${label}`);
  }
  const startYear = parseInt(parts[0], 10);
  const endYear = parseInt(parts[1], 10);
  if (endYear !== startYear + 1) {
    throw new Error(`Saison invalide : ${label}`);
  }
  return { label: `${startYear}-${endYear}`, startYear, endYear };
}

export const DATA_TYPES: ReadonlyArray<{ value: DataType; label: string }> = [
  { value: "standings", label: "Classement" },
  { value: "fixtures", label: "Calendrier" },
];

export function isDataType(value: unknown): value is DataType {
  return value === "standings" || value === "fixtures";
}

export function getDataTypeLabel(dataType: DataType): string {
  return DATA_TYPES.find((d) => d.value === dataType)?.label ?? dataType;
}
