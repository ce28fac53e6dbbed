/**
 * Service données championnat - classement ou calendrier d'une saison
 * Scrape fbref, met en cache 1h (LEAGUE_DATA_CACHE_TTL_MS), ne lève jamais :
 * les erreurs sont retournées dans { ok: false, error }.
 */

import type { LeagueDataRequest, LeagueDataResult, LeagueDataSuccess } from "@/types/league";
import { getLeagueByName, parseSeason, type LeagueConfig } from "./league-config";
import { getLeagueDataCacheTtlMs } from "./scraper-config";
import { NO_TABLE_ERROR, scrapeFixtures, scrapeStandings } from "./scrapers";
import { TtlCache } from "./ttl-cache";

const cache = new TtlCache<LeagueDataSuccess>({ ttlMs: 60 * 60 * 1000 });

/** Requêtes en cours : deux appels identiques partagent le même scrape */
const inFlight = new Map<string, Promise<LeagueDataResult>>();

function cacheKey(season: string, league: LeagueConfig, dataType: string): string {
  return `${season}|${league.fbrefId}|${dataType}`;
}

export function clearLeagueDataCache(): void {
  cache.clear();
  inFlight.clear();
}

function noTableMessage(season: string): string {
  return `Aucun tableau trouvé pour la saison ${season}.`;
}

async function scrape(season: string, league: LeagueConfig, request: LeagueDataRequest): Promise<LeagueDataResult> {
  const fetchedAt = new Date().toISOString();
  try {
    if (request.dataType === "standings") {
      const rows = await scrapeStandings(season, league);
      if (rows.length === 0) return { ok: false, error: noTableMessage(season) };
      return { ok: true, dataType: "standings", rows, season, league: league.name, fetchedAt };
    }
    const rows = await scrapeFixtures(season, league);
    if (rows.length === 0) return { ok: false, error: noTableMessage(season) };
    return { ok: true, dataType: "fixtures", rows, season, league: league.name, fetchedAt };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[league-data] ${league.name} ${season} ${request.dataType} failed:`, message);
    if (message === NO_TABLE_ERROR) return { ok: false, error: noTableMessage(season) };
    return { ok: false, error: `Erreur lors de la récupération des données : ${message}` };
  }
}

export async function getLeagueData(request: LeagueDataRequest): Promise<LeagueDataResult> {
  const league = getLeagueByName(request.leagueName);
  if (!league) {
    return { ok: false, error: `Championnat inconnu : ${request.leagueName}` };
  }

  let season: string;
  try {
    season = parseSeason(request.season).label;
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : `Saison invalide : ${request.season}` };
  }

  const key = cacheKey(season, league, request.dataType);
  const cached = cache.get(key);
  if (cached) return cached;

  const pending = inFlight.get(key);
  if (pending) return pending;

  const promise = scrape(season, league, request).then((result) => {
    if (result.ok) cache.set(key, result, getLeagueDataCacheTtlMs());
    if (process.env.NODE_ENV === "development") {
      // eslint-disable-next-line no-console
      console.log(`[league-data] ${key} → ${result.ok ? `${result.rows.length} lignes` : "ÉCHEC"}`);
    }
    return result;
  });
  inFlight.set(key, promise);
  try {
    return await promise;
  } finally {
    inFlight.delete(key);
  }
}
