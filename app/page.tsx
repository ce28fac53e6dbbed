"use client";

import { useEffect, useState } from "react";
import type { LeagueDataResult } from "@/types/league";
import { FilterSidebar, getDefaultFilters, type Filters } from "@/components/FilterSidebar";
import { LeagueHeader } from "@/components/LeagueHeader";
import { SectionHeader } from "@/components/SectionHeader";
import { StatusBanner } from "@/components/StatusBanner";
import { EmptyState } from "@/components/EmptyState";
import { DataTable, FIXTURES_TABLE_COLUMNS, STANDINGS_TABLE_COLUMNS } from "@/components/DataTable";
import { PointsBarChart } from "@/components/PointsBarChart";
import { TeamComparison } from "@/components/TeamComparison";
import { FixturesSummaryCards } from "@/components/FixturesSummaryCards";
import { fetchLeagueData } from "@/lib/league-data-client";

export default function DashboardPage() {
  const [filters, setFilters] = useState<Filters>(getDefaultFilters);
  const [result, setResult] = useState<LeagueDataResult | null>(null);
  const [loading, setLoading] = useState(true);
  const [reloadToken, setReloadToken] = useState(0);

  useEffect(() => {
    // une requête par combinaison de filtres, la précédente est annulée
    const controller = new AbortController();
    setLoading(true);
    setResult(null);
    fetchLeagueData(filters, controller.signal)
      .then((data) => {
        if (!controller.signal.aborted) setResult(data);
      })
      .catch((err: unknown) => {
        if (controller.signal.aborted) return;
        setResult({ ok: false, error: err instanceof Error ? err.message : "Erreur" });
      })
      .finally(() => {
        if (!controller.signal.aborted) setLoading(false);
      });
    return () => controller.abort();
  }, [filters, reloadToken]);

  return (
    <div className="min-h-screen bg-[#0A1F1C] px-4 py-6 sm:px-6 lg:px-8">
      <header className="mb-8 flex items-center gap-4 pt-2">
        <span className="text-4xl" role="img" aria-hidden>
          ⚽
        </span>
        <div>
          <h1 className="text-2xl font-bold tracking-tight text-[#F9FAFB] sm:text-3xl">
            Tableau de bord des championnats
          </h1>
          <p className="mt-1 text-[#9CA3AF]">Classements et calendriers des 5 grands championnats</p>
        </div>
      </header>

      <div className="mx-auto flex max-w-7xl flex-col gap-6 lg:flex-row lg:items-start">
        <FilterSidebar filters={filters} onChange={setFilters} />

        <main className="min-w-0 flex-1 space-y-8">
          {loading && (
            <div className="flex flex-col items-center gap-4 py-16">
              <span className="inline-block text-5xl animate-spin" role="img" aria-label="Chargement">
                ⚽
              </span>
              <p className="text-[#9CA3AF]">Récupération des données...</p>
            </div>
          )}

          {!loading && result && !result.ok && (
            <div className="space-y-4">
              <StatusBanner status="error" message={result.error} />
              <EmptyState
                icon="📉"
                title="Échec de la récupération des données. Réessaie."
                onRetry={() => setReloadToken((t) => t + 1)}
              />
            </div>
          )}

          {!loading && result?.ok && (
            <>
              <StatusBanner status="success" message="Données récupérées avec succès !" />
              <LeagueHeader
                league={result.league}
                season={result.season}
                dataType={result.dataType}
                fetchedAt={result.fetchedAt}
              />

              {result.dataType === "standings" ? (
                <>
                  <DataTable
                    columns={STANDINGS_TABLE_COLUMNS}
                    rows={result.rows}
                    getRowKey={(r) => r.team}
                    caption="Classement"
                  />
                  <section aria-labelledby="points-title">
                    <SectionHeader id="points-title" icon="📊" title="Visualisation des points" />
                    <PointsBarChart rows={result.rows} />
                  </section>
                  <section aria-labelledby="comparison-title">
                    <SectionHeader id="comparison-title" icon="⚖️" title="Comparaison des équipes" />
                    <TeamComparison key={`${result.league}-${result.season}`} rows={result.rows} />
                  </section>
                </>
              ) : (
                <>
                  <section aria-labelledby="summary-title">
                    <SectionHeader id="summary-title" icon="📅" title="Résumé de la saison" />
                    <FixturesSummaryCards rows={result.rows} />
                  </section>
                  <section aria-labelledby="fixtures-title">
                    <SectionHeader id="fixtures-title" icon="🗓️" title="Matchs" count={result.rows.length} />
                    <DataTable
                      columns={FIXTURES_TABLE_COLUMNS}
                      rows={result.rows}
                      getRowKey={(r, i) => `${i}-${r.homeTeam}-${r.awayTeam}`}
                      caption="Calendrier"
                    />
                  </section>
                </>
              )}
            </>
          )}
        </main>
      </div>
    </div>
  );
}
