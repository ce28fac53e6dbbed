import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import DashboardPage from "../page";
import { FIXTURES, STANDINGS } from "@/lib/__tests__/sample-data";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const standings = {
  ok: true,
  dataType: "standings",
  rows: STANDINGS,
  season: "2023-2024",
  league: "Premier League",
  fetchedAt: "2024-06-01T10:00:00.000Z",
};

describe("DashboardPage", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("charge le classement par défaut et affiche les visualisations", async () => {
    fetchMock.mockResolvedValue(json(standings));
    render(<DashboardPage />);
    expect(screen.getByText("Récupération des données...")).toBeInTheDocument();
    expect(await screen.findByText("Données récupérées avec succès !")).toBeInTheDocument();
    expect(screen.getByRole("heading", { name: "Premier League Classement - Saison 2023-2024" })).toBeInTheDocument();
    expect(screen.getByText("Visualisation des points")).toBeInTheDocument();
    expect(screen.getByText("Comparaison des équipes")).toBeInTheDocument();
    expect(fetchMock.mock.calls[0][0]).toBe("/api/league-data?league=Premier+League&season=2023-2024&type=standings");
  });

  it("affiche le résumé et les matchs pour le calendrier", async () => {
    fetchMock.mockImplementation(async (input) =>
      String(input).includes("type=fixtures")
        ? json({ ...standings, dataType: "fixtures", rows: FIXTURES })
        : json(standings)
    );
    render(<DashboardPage />);
    await screen.findByText("Données récupérées avec succès !");
    fireEvent.change(screen.getByLabelText("Type de données"), { target: { value: "fixtures" } });
    expect(await screen.findByText("Résumé de la saison")).toBeInTheDocument();
    expect(screen.getByRole("heading", { name: "Premier League Calendrier - Saison 2023-2024" })).toBeInTheDocument();
    expect(screen.queryByText("Visualisation des points")).toBeNull();
  });

  it("affiche l'erreur puis réessaie", async () => {
    fetchMock
      .mockResolvedValueOnce(json({ error: "Aucun tableau trouvé pour la saison 2023-2024." }, 502))
      .mockResolvedValueOnce(json(standings));
    render(<DashboardPage />);
    expect(await screen.findByRole("alert")).toHaveTextContent("Aucun tableau trouvé pour la saison 2023-2024.");
    expect(screen.getByText("Échec de la récupération des données. Réessaie.")).toBeInTheDocument();
    fireEvent.click(screen.getByRole("button", { name: "Réessayer" }));
    await waitFor(() => expect(screen.getByText("Données récupérées avec succès !")).toBeInTheDocument());
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
