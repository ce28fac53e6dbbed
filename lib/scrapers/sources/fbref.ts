/**
 * Scraper fbref - classements et calendriers des 5 grands championnats
 * https://fbref.com/en/comps/
 *
 * Le premier tableau de la page "Stats" est le classement général,
 * celui de la page "Scores-and-Fixtures" le calendrier complet.
 * fbref limite le nombre de requêtes : le rate-limit est géré par base-scraper.
 */

import type { DataType, FixtureRow, StandingRow } from "@/types/league";
import type { LeagueConfig } from "@/lib/league-config";
import { parseSeason } from "@/lib/league-config";
import { getFbrefBaseUrl } from "@/lib/scraper-config";
import { fetchHtml } from "../base-scraper";
import { parseHtmlTables, selectColumns, type HtmlTable } from "../html-table";

const STANDINGS_COLUMNS = {
  rank: "Rk",
  team: "Squad",
  matchesPlayed: "MP",
  wins: "W",
  draws: "D",
  losses: "L",
  goalsFor: "GF",
  goalsAgainst: "GA",
  goalDifference: "GD",
  points: "Pts",
  attendance: "Attendance",
} as const;

const FIXTURE_COLUMNS = {
  date: "Date",
  time: "Time",
  homeTeam: "Home",
  score: "Score",
  awayTeam: "Away",
  attendance: "Attendance",
  venue: "Venue",
} as const;

export const NO_TABLE_ERROR = "Aucun tableau trouvé";

export function buildFbrefUrl(
  season: string,
  league: LeagueConfig,
  dataType: DataType,
  baseUrl: string = getFbrefBaseUrl()
): string {
  const { startYear, endYear } = parseSeason(season);
  const years = `${startYear}-${endYear}`;
  if (dataType === "standings") {
    return `${baseUrl}/en/comps/${league.fbrefId}/${years}/${years}-${league.slug}-Stats`;
  }
  return `${baseUrl}/en/comps/${league.fbrefId}/${years}/schedule/${years}-${league.slug}-Scores-and-Fixtures`;
}

/**
 * "1,234" → 1234, "+12" → 12, "-3" → -3, "" → null
 */
export function parseNumber(text: string): number | null {
  const cleaned = text.replace(/,/g, "").replace(/^\+/, "").trim();
  if (!cleaned || !/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

function orNull(text: string): string | null {
  return text === "" ? null : text;
}

function firstTable(html: string): HtmlTable {
  const tables = parseHtmlTables(html);
  if (tables.length === 0) throw new Error(NO_TABLE_ERROR);
  return tables[0];
}

export function parseStandingsHtml(html: string): StandingRow[] {
  const rows: StandingRow[] = [];
  for (const get of selectColumns(firstTable(html), STANDINGS_COLUMNS)) {
    const team = get("team");
    const rank = parseNumber(get("rank"));
    const matchesPlayed = parseNumber(get("matchesPlayed"));
    const wins = parseNumber(get("wins"));
    const draws = parseNumber(get("draws"));
    const losses = parseNumber(get("losses"));
    const goalsFor = parseNumber(get("goalsFor"));
    const goalsAgainst = parseNumber(get("goalsAgainst"));
    const goalDifference = parseNumber(get("goalDifference"));
    const points = parseNumber(get("points"));
    if (
      !team ||
      rank == null ||
      matchesPlayed == null ||
      wins == null ||
      draws == null ||
      losses == null ||
      goalsFor == null ||
      goalsAgainst == null ||
      goalDifference == null ||
      points == null
    ) {
      continue;
    }
    rows.push({
      rank,
      team,
      matchesPlayed,
      wins,
      draws,
      losses,
      goalsFor,
      goalsAgainst,
      goalDifference,
      points,
      attendance: parseNumber(get("attendance")),
    });
  }
  return rows;
}

export function parseFixturesHtml(html: string): FixtureRow[] {
  const rows: FixtureRow[] = [];
  for (const get of selectColumns(firstTable(html), FIXTURE_COLUMNS)) {
    const homeTeam = get("homeTeam");
    const awayTeam = get("awayTeam");
    if (!homeTeam || !awayTeam) continue;
    rows.push({
      date: orNull(get("date")),
      time: orNull(get("time")),
      homeTeam,
      score: orNull(get("score")),
      awayTeam,
      attendance: parseNumber(get("attendance")),
      venue: orNull(get("venue")),
    });
  }
  return rows;
}

export async function scrapeStandings(season: string, league: LeagueConfig): Promise<StandingRow[]> {
  const html = await fetchHtml(buildFbrefUrl(season, league, "standings"));
  return parseStandingsHtml(html);
}

export async function scrapeFixtures(season: string, league: LeagueConfig): Promise<FixtureRow[]> {
  const html = await fetchHtml(buildFbrefUrl(season, league, "fixtures"));
  return parseFixturesHtml(html);
}
