// @vitest-environment node
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { clearLeagueDataCache, getLeagueData } from "../league-data-service";
import { NO_TABLE_ERROR, scrapeFixtures, scrapeStandings } from "../scrapers/sources/fbref";
import { FIXTURES, STANDINGS } from "./sample-data";

vi.mock("../scrapers/sources/fbref", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../scrapers/sources/fbref")>();
  return {
    ...actual,
    scrapeStandings: vi.fn(),
    scrapeFixtures: vi.fn(),
  };
});

describe("getLeagueData", () => {
  beforeEach(() => {
    clearLeagueDataCache();
    vi.mocked(scrapeStandings).mockReset();
    vi.mocked(scrapeFixtures).mockReset();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("retourne le classement avec les métadonnées", async () => {
    vi.mocked(scrapeStandings).mockResolvedValue(STANDINGS);
    const result = await getLeagueData({ season: "2023-2024", leagueName: "Premier League", dataType: "standings" });
    expect(result).toMatchObject({
      ok: true,
      dataType: "standings",
      rows: STANDINGS,
      season: "2023-2024",
      league: "Premier League",
    });
    expect(result.ok && typeof result.fetchedAt).toBe("string");
    expect(vi.mocked(scrapeStandings).mock.calls[0][0]).toBe("2023-2024");
    expect(vi.mocked(scrapeStandings).mock.calls[0][1].fbrefId).toBe("9");
  });

  it("retourne le calendrier", async () => {
    vi.mocked(scrapeFixtures).mockResolvedValue(FIXTURES);
    const result = await getLeagueData({ season: "2021-2022", leagueName: "Ligue 1", dataType: "fixtures" });
    expect(result).toMatchObject({ ok: true, dataType: "fixtures", rows: FIXTURES, league: "Ligue 1" });
    expect(scrapeStandings).not.toHaveBeenCalled();
  });

  it("refuse un championnat inconnu sans scraper", async () => {
    const result = await getLeagueData({ season: "2023-2024", leagueName: "Eredivisie", dataType: "standings" });
    expect(result).toEqual({ ok: false, error: "Championnat inconnu : Eredivisie" });
    expect(scrapeStandings).not.toHaveBeenCalled();
  });

  it("refuse une saison invalide", async () => {
    const result = await getLeagueData({ season: "2023-2025", leagueName: "La Liga", dataType: "standings" });
    expect(result).toEqual({ ok: false, error: "Saison invalide : 2023-2025" });
  });

  it("met en cache les succès", async () => {
    vi.mocked(scrapeStandings).mockResolvedValue(STANDINGS);
    const request = { season: "2023-2024", leagueName: "Serie A", dataType: "standings" } as const;
    const first = await getLeagueData(request);
    const second = await getLeagueData(request);
    expect(second).toBe(first);
    expect(scrapeStandings).toHaveBeenCalledTimes(1);
  });

  it("distingue les clés de cache par type de données", async () => {
    vi.mocked(scrapeStandings).mockResolvedValue(STANDINGS);
    vi.mocked(scrapeFixtures).mockResolvedValue(FIXTURES);
    await getLeagueData({ season: "2023-2024", leagueName: "Serie A", dataType: "standings" });
    await getLeagueData({ season: "2023-2024", leagueName: "Serie A", dataType: "fixtures" });
    expect(scrapeStandings).toHaveBeenCalledTimes(1);
    expect(scrapeFixtures).toHaveBeenCalledTimes(1);
  });

  it("ne met pas en cache les échecs", async () => {
    vi.mocked(scrapeStandings)
      .mockRejectedValueOnce(new Error("HTTP 429: https://fbref.com/x"))
      .mockResolvedValueOnce(STANDINGS);
    const request = { season: "2022-2023", leagueName: "Bundesliga", dataType: "standings" } as const;
    expect(await getLeagueData(request)).toEqual({
      ok: false,
      error: "Erreur lors de la récupération des données : HTTP 429: https://fbref.com/x",
    });
    expect((await getLeagueData(request)).ok).toBe(true);
    expect(scrapeStandings).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("signale l'absence de tableau pour la saison", async () => {
    vi.mocked(scrapeStandings).mockRejectedValue(new Error(NO_TABLE_ERROR));
    const result = await getLeagueData({ season: "2012-2013", leagueName: "La Liga", dataType: "standings" });
    expect(result).toEqual({ ok: false, error: "Aucun tableau trouvé pour la saison 2012-2013." });
  });

  it("traite un tableau vide comme une absence de données", async () => {
    vi.mocked(scrapeFixtures).mockResolvedValue([]);
    const result = await getLeagueData({ season: "2012-2013", leagueName: "La Liga", dataType: "fixtures" });
    expect(result).toEqual({ ok: false, error: "Aucun tableau trouvé pour la saison 2012-2013." });
  });

  it("partage un scrape en cours entre deux appels identiques", async () => {
    let resolve: (rows: typeof STANDINGS) => void = () => {};
    vi.mocked(scrapeStandings).mockImplementation(
      () => new Promise((r) => {
        resolve = r;
      })
    );
    const request = { season: "2019-2020", leagueName: "Premier League", dataType: "standings" } as const;
    const a = getLeagueData(request);
    const b = getLeagueData(request);
    await Promise.resolve();
    resolve(STANDINGS);
    const [ra, rb] = await Promise.all([a, b]);
    expect(ra).toBe(rb);
    expect(scrapeStandings).toHaveBeenCalledTimes(1);
  });

  it("ne met rien en cache avec un TTL nul", async () => {
    vi.stubEnv("LEAGUE_DATA_CACHE_TTL_MS", "0");
    vi.mocked(scrapeStandings).mockResolvedValue(STANDINGS);
    const request = { season: "2018-2019", leagueName: "Ligue 1", dataType: "standings" } as const;
    await getLeagueData(request);
    await getLeagueData(request);
    expect(scrapeStandings).toHaveBeenCalledTimes(2);
  });
});
