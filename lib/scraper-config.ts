/**
 * Config du scraping fbref (rate-limit, timeout, retries, cache).
 * Lue à chaque appel depuis l'environnement, valeurs invalides = défaut.
 *
 * Env :
 * - FBREF_BASE_URL            (défaut https://fbref.com)
 * - SCRAPER_RATE_LIMIT_MS     délai minimum entre 2 requêtes sur un même domaine
 * - SCRAPER_TIMEOUT_MS        abandon d'une requête
 * - SCRAPER_MAX_RETRIES       nombre de nouvelles tentatives après échec réseau
 * - SCRAPER_RETRY_DELAY_MS    la n-ième tentative attend n × ce délai
 * - LEAGUE_DATA_CACHE_TTL_MS  durée de vie du cache des classements/calendriers
 */

const DEFAULT_BASE_URL = "https://fbref.com";

export interface ScraperConfig {
  baseUrl: string;
  rateLimitMs: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (!value?.trim()) return fallback;
  const n = Number(value.trim());
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const n = parseNonNegativeInt(value, fallback);
  return n > 0 ? n : fallback;
}

export function getFbrefBaseUrl(): string {
  const v = process.env.FBREF_BASE_URL?.trim();
  if (!v) return DEFAULT_BASE_URL;
  return v.replace(/\/+$/, "");
}

export function getScraperConfig(): ScraperConfig {
  return {
    baseUrl: getFbrefBaseUrl(),
    rateLimitMs: parseNonNegativeInt(process.env.SCRAPER_RATE_LIMIT_MS, 3000),
    timeoutMs: parsePositiveInt(process.env.SCRAPER_TIMEOUT_MS, 15000),
    maxRetries: parseNonNegativeInt(process.env.SCRAPER_MAX_RETRIES, 2),
    retryDelayMs: parseNonNegativeInt(process.env.SCRAPER_RETRY_DELAY_MS, 1000),
  };
}

/** 1h par défaut */
export function getLeagueDataCacheTtlMs(): number {
  return parseNonNegativeInt(process.env.LEAGUE_DATA_CACHE_TTL_MS, 60 * 60 * 1000);
}
