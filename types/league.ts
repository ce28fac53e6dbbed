/**
 * Types des données de championnat (classements, calendriers)
 * Produites par le scraper fbref puis servies par /api/league-data
 */

export type DataType = "standings" | "fixtures";

/** Une ligne du classement général */
export interface StandingRow {
  rank: number;
  team: string;
  matchesPlayed: number;
  wins: number;
  draws: number;
  losses: number;
  goalsFor: number;
  goalsAgainst: number;
  goalDifference: number;
  points: number;
  /** Affluence moyenne à domicile (absente sur certaines saisons) */
  attendance: number | null;
}

/** Un match du calendrier (joué ou à venir) */
export interface FixtureRow {
  /** Date ISO (YYYY-MM-DD) telle qu'affichée par la source */
  date: string | null;
  /** Heure locale du match (HH:MM) */
  time: string | null;
  homeTeam: string;
  /** Score brut ("2–1"), null si match non joué */
  score: string | null;
  awayTeam: string;
  attendance: number | null;
  venue: string | null;
}

interface LeagueDataMeta {
  season: string;
  league: string;
  /** Date de récupération (ISO) */
  fetchedAt: string;
}

export type LeagueDataSuccess =
  | (LeagueDataMeta & { ok: true; dataType: "standings"; rows: StandingRow[] })
  | (LeagueDataMeta & { ok: true; dataType: "fixtures"; rows: FixtureRow[] });

export interface LeagueDataFailure {
  ok: false;
  error: string;
}

export type LeagueDataResult = LeagueDataSuccess | LeagueDataFailure;

export interface LeagueDataRequest {
  season: string;
  leagueName: string;
  dataType: DataType;
}
