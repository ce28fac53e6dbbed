// @vitest-environment node
import { describe, it, expect, vi, beforeEach } from "vitest";
import { NextRequest } from "next/server";
import { GET } from "../route";
import { GET as getLeagues } from "../../leagues/route";
import { getLeagueData } from "@/lib/league-data-service";
import { STANDINGS } from "@/lib/__tests__/sample-data";

vi.mock("@/lib/league-data-service", () => ({
  getLeagueData: vi.fn(),
}));

function request(query: string): NextRequest {
  return new NextRequest(`http://localhost/api/league-data?${query}`);
}

describe("GET /api/league-data", () => {
  beforeEach(() => {
    vi.mocked(getLeagueData).mockReset();
  });

  it("retourne les données du service", async () => {
    const result = {
      ok: true as const,
      dataType: "standings" as const,
      rows: STANDINGS,
      season: "2023-2024",
      league: "Premier League",
      fetchedAt: "2024-06-01T10:00:00.000Z",
    };
    vi.mocked(getLeagueData).mockResolvedValue(result);
    const res = await GET(request("league=Premier%20League&season=2023-2024&type=standings"));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(result);
    expect(getLeagueData).toHaveBeenCalledWith({
      season: "2023-2024",
      leagueName: "Premier League",
      dataType: "standings",
    });
  });

  it("classement par défaut sans type", async () => {
    vi.mocked(getLeagueData).mockResolvedValue({ ok: false, error: "x" });
    await GET(request("league=Ligue%201&season=2015-2016"));
    expect(getLeagueData).toHaveBeenCalledWith({ season: "2015-2016", leagueName: "Ligue 1", dataType: "standings" });
  });

  it("400 pour un championnat inconnu", async () => {
    const res = await GET(request("league=Eredivisie&season=2023-2024"));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Championnat inconnu : Eredivisie" });
    expect(getLeagueData).not.toHaveBeenCalled();
  });

  it("400 pour une saison invalide", async () => {
    const res = await GET(request("league=Serie%20A&season=2023"));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Saison invalide : 2023" });
  });

  it("400 pour un type inconnu", async () => {
    const res = await GET(request("league=Serie%20A&season=2023-2024&type=players"));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Type de données inconnu : players" });
  });

  it("502 quand le scraping échoue", async () => {
    vi.mocked(getLeagueData).mockResolvedValue({ ok: false, error: "Aucun tableau trouvé pour la saison 2023-2024." });
    const res = await GET(request("league=Bundesliga&season=2023-2024&type=fixtures"));
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "Aucun tableau trouvé pour la saison 2023-2024." });
  });

  it("500 sur une erreur inattendue", async () => {
    vi.mocked(getLeagueData).mockRejectedValue(new Error("boom"));
    const res = await GET(request("league=Bundesliga&season=2023-2024"));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "boom" });
  });
});

describe("GET /api/leagues", () => {
  it("expose championnats, saisons et types", async () => {
    const res = await getLeagues();
    const body = await res.json();
    expect(body.leagues).toHaveLength(5);
    expect(body.leagues[0]).toEqual({ name: "Premier League", fbrefId: "9", countryCode: "gb-eng" });
    expect(body.seasons[0]).toBe("2023-2024");
    expect(body.dataTypes).toEqual([
      { value: "standings", label: "Classement" },
      { value: "fixtures", label: "Calendrier" },
    ]);
  });
});
