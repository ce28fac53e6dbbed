/**
 * Données des visualisations : points par équipe, comparaison radar, résumé calendrier.
 * Calcul pur, le rendu SVG est dans components/.
 */

import type { FixtureRow, StandingRow } from "@/types/league";

export interface PointsBar {
  team: string;
  points: number;
}

export interface PointsChartData {
  bars: PointsBar[];
  maxPoints: number;
}

/** Une barre par équipe, dans l'ordre du classement */
export function buildPointsChart(rows: StandingRow[]): PointsChartData {
  const bars = rows.map((r) => ({ team: r.team, points: r.points }));
  const maxPoints = bars.reduce((max, b) => Math.max(max, b.points), 0);
  return { bars, maxPoints };
}

export type RadarCategory =
  | "matchesPlayed"
  | "wins"
  | "draws"
  | "losses"
  | "goalsFor"
  | "goalsAgainst"
  | "points";

export const RADAR_CATEGORIES: ReadonlyArray<{ key: RadarCategory; label: string }> = [
  { key: "matchesPlayed", label: "Matchs joués" },
  { key: "wins", label: "Victoires" },
  { key: "draws", label: "Nuls" },
  { key: "losses", label: "Défaites" },
  { key: "goalsFor", label: "Buts pour" },
  { key: "goalsAgainst", label: "Buts contre" },
  { key: "points", label: "Points" },
];

export const COMPARISON_COLORS = ["#3b82f6", "#93c5fd"] as const;

export interface RadarSeries {
  team: string;
  values: number[];
  color: string;
}

export interface TeamComparison {
  categories: string[];
  series: [RadarSeries, RadarSeries];
  radialMax: number;
  title: string;
}

/**
 * Les 2 équipes les mieux classées (rang le plus petit), ordre du tableau en cas d'égalité.
 */
export function pickDefaultComparison(rows: StandingRow[]): [string, string] | null {
  if (rows.length < 2) return null;
  const sorted = rows
    .map((row, index) => ({ row, index }))
    .sort((a, b) => a.row.rank - b.row.rank || a.index - b.index);
  return [sorted[0].row.team, sorted[1].row.team];
}

function radarValues(row: StandingRow): number[] {
  return RADAR_CATEGORIES.map(({ key }) => row[key]);
}

export function buildTeamComparison(
  rows: StandingRow[],
  team1: string,
  team2: string
): TeamComparison | null {
  const row1 = rows.find((r) => r.team === team1);
  const row2 = rows.find((r) => r.team === team2);
  if (!row1 || !row2) return null;

  // échelle commune : max toutes équipes / toutes catégories
  let radialMax = 0;
  for (const row of rows) {
    for (const v of radarValues(row)) radialMax = Math.max(radialMax, v);
  }

  return {
    categories: RADAR_CATEGORIES.map((c) => c.label),
    series: [
      { team: team1, values: radarValues(row1), color: COMPARISON_COLORS[0] },
      { team: team2, values: radarValues(row2), color: COMPARISON_COLORS[1] },
    ],
    radialMax,
    title: `Comparaison entre ${team1} et ${team2}`,
  };
}

export interface Point {
  x: number;
  y: number;
}

/** Position sur l'axe i (sur n), premier axe vers le haut, sens horaire */
export function radarPoint(index: number, count: number, distance: number, center: Point): Point {
  const angle = -Math.PI / 2 + (2 * Math.PI * index) / count;
  return {
    x: center.x + distance * Math.cos(angle),
    y: center.y + distance * Math.sin(angle),
  };
}

export function radarPolygon(values: number[], max: number, radius: number, center: Point): Point[] {
  return values.map((v, i) => {
    const distance = max > 0 ? (radius * Math.max(0, v)) / max : 0;
    return radarPoint(i, values.length, distance, center);
  });
}

export function toSvgPoints(points: Point[]): string {
  return points.map((p) => `${p.x.toFixed(2)},${p.y.toFixed(2)}`).join(" ");
}

export interface MatchScore {
  home: number;
  away: number;
}

/** "2–1", "2-1", "(4) 1–1 (3)" → buts; null si match non joué */
export function parseScore(score: string | null): MatchScore | null {
  if (!score) return null;
  const m = score.match(/^\s*(?:\(\d+\)\s*)?(\d+)\s*[–—-]\s*(\d+)\s*(?:\(\d+\))?\s*$/);
  if (!m) return null;
  return { home: parseInt(m[1], 10), away: parseInt(m[2], 10) };
}

export interface FixturesSummary {
  total: number;
  played: number;
  upcoming: number;
  homeWins: number;
  draws: number;
  awayWins: number;
  totalGoals: number;
  averageGoals: number | null;
  averageAttendance: number | null;
}

export function summarizeFixtures(rows: FixtureRow[]): FixturesSummary {
  let played = 0;
  let homeWins = 0;
  let draws = 0;
  let awayWins = 0;
  let totalGoals = 0;
  let attendanceSum = 0;
  let attendanceCount = 0;

  for (const row of rows) {
    const score = parseScore(row.score);
    if (!score) continue;
    played++;
    totalGoals += score.home + score.away;
    if (score.home > score.away) homeWins++;
    else if (score.home < score.away) awayWins++;
    else draws++;
    if (row.attendance != null) {
      attendanceSum += row.attendance;
      attendanceCount++;
    }
  }

  return {
    total: rows.length,
    played,
    upcoming: rows.length - played,
    homeWins,
    draws,
    awayWins,
    totalGoals,
    averageGoals: played > 0 ? Math.round((totalGoals / played) * 100) / 100 : null,
    averageAttendance: attendanceCount > 0 ? Math.round(attendanceSum / attendanceCount) : null,
  };
}
