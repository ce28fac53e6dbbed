import { NextResponse } from "next/server";
import { DATA_TYPES, LEAGUES, getAvailableSeasons } from "@/lib/league-config";

/**
 * GET /api/leagues
 * Championnats, saisons (la plus récente en premier) et types de données pour les filtres.
 */
export async function GET() {
  return NextResponse.json({
    leagues: LEAGUES.map((l) => ({ name: l.name, fbrefId: l.fbrefId, countryCode: l.countryCode })),
    seasons: getAvailableSeasons(),
    dataTypes: DATA_TYPES,
  });
}
