/**
 * Extraction générique des tableaux HTML (équivalent read_html)
 * - en-têtes multi-niveaux : on garde la dernière ligne du <thead>
 * - lignes d'en-tête répétées / séparateurs ignorés
 */

import * as cheerio from "cheerio";

export interface HtmlTable {
  id?: string;
  columns: string[];
  rows: string[][];
}

const SKIPPED_ROW_CLASSES = ["thead", "over_header", "spacer"];

function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function parseHtmlTables(html: string): HtmlTable[] {
  const $ = cheerio.load(html);
  const tables: HtmlTable[] = [];

  for (const table of $("table").toArray()) {
    const $table = $(table);
    const headerRows = $table.find("thead tr").toArray();
    const lastHeader = headerRows[headerRows.length - 1];
    const columns = lastHeader
      ? $(lastHeader)
          .children("th, td")
          .toArray()
          .map((cell) => cleanText($(cell).text()))
      : [];

    const rows: string[][] = [];
    for (const tr of $table.find("tbody tr").toArray()) {
      const $tr = $(tr);
      const classes = ($tr.attr("class") ?? "").split(/\s+/);
      if (classes.some((c) => SKIPPED_ROW_CLASSES.includes(c))) continue;
      const cells = $tr
        .children("th, td")
        .toArray()
        .map((cell) => cleanText($(cell).text()));
      if (cells.every((c) => c === "")) continue;
      rows.push(cells);
    }

    tables.push({ id: $table.attr("id") || undefined, columns, rows });
  }

  return tables;
}

/** Lecture d'une ligne sélectionnée par clé cible */
export type RowReader<K extends string> = (key: K) => string;

/**
 * Sélectionne et renomme des colonnes : mapping clé cible → colonne source.
 * Prend la première colonne portant le nom exact. Erreur si une colonne manque.
 */
export function selectColumns<K extends string>(
  table: HtmlTable,
  mapping: Readonly<Record<K, string>>
): Array<RowReader<K>> {
  const entries: Array<[string, string]> = Object.entries(mapping);
  const missing = entries.map(([, col]) => col).filter((col) => !table.columns.includes(col));
  if (missing.length > 0) {
    throw new Error(`Colonnes manquantes: ${missing.join(", ")}`);
  }

  const indexByKey = new Map<string, number>();
  for (const [key, col] of entries) indexByKey.set(key, table.columns.indexOf(col));

  return table.rows.map((cells) => (key: K) => cells[indexByKey.get(key) ?? -1] ?? "");
}
