/**
 * API route - classement ou calendrier d'un championnat
 * GET /api/league-data?league=Premier%20League&season=2023-2024&type=standings
 * type: standings (défaut) | fixtures
 */

import { NextRequest, NextResponse } from "next/server";
import { getLeagueByName, isDataType, parseSeason } from "@/lib/league-config";
import { getLeagueData } from "@/lib/league-data-service";

export async function GET(request: NextRequest) {
  const { searchParams } = new URL(request.url);
  const leagueName = searchParams.get("league") ?? "";
  const season = searchParams.get("season") ?? "";
  const dataType = searchParams.get("type") ?? "standings";

  if (!getLeagueByName(leagueName)) {
    return NextResponse.json({ error: `Championnat inconnu : ${leagueName}` }, { status: 400 });
  }
  try {
    parseSeason(season);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Saison invalide";
    return NextResponse.json({ error: message }, { status: 400 });
  }
  if (!isDataType(dataType)) {
    return NextResponse.json({ error: `Type de données inconnu : ${dataType}` }, { status: 400 });
  }

  try {
    const result = await getLeagueData({ season, leagueName, dataType });
    if (!result.ok) {
      return NextResponse.json({ error: result.error }, { status: 502 });
    }
    return NextResponse.json(result);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Scraping failed";
    return NextResponse.json({ error: message }, { status: 500 });
  }
}
