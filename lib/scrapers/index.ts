/**
 * Module Scraping - classements et calendriers fbref
 *
 * ATTENTION LEGALE :
 * - Vérifier les Conditions d'utilisation de fbref avant déploiement
 * - Respecter robots.txt, rate-limiting (≈10 requêtes/minute), user-agent
 * - Usage personnel / éducatif recommandé
 */

export { fetchWithRetry, fetchHtml } from "./base-scraper";
export { parseHtmlTables, selectColumns } from "./html-table";
export type { HtmlTable, RowReader } from "./html-table";
export {
  buildFbrefUrl,
  parseNumber,
  parseStandingsHtml,
  parseFixturesHtml,
  scrapeStandings,
  scrapeFixtures,
  NO_TABLE_ERROR,
} from "./sources/fbref";
export type { StandingRow, FixtureRow } from "@/types/league";
