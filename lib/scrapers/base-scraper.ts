/**
 * Base scraper - fetch avec retry, rate-limit, user-agent
 * Respect des bonnes pratiques (fbref limite à ~10 requêtes/minute)
 */

import { getScraperConfig } from "../scraper-config";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/** Dernière requête effectuée (par domaine) */
const lastRequestByDomain = new Map<string, number>();

async function delay(ms: number): Promise<void> {
  if (ms <= 0) return;
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Rate-limit : attend si nécessaire avant de faire une requête
 */
async function rateLimit(domain: string, minIntervalMs: number): Promise<void> {
  // créneau réservé avant d'attendre : deux appels simultanés ne partent pas ensemble
  const last = lastRequestByDomain.get(domain);
  const next = last == null ? Date.now() : Math.max(Date.now(), last + minIntervalMs);
  lastRequestByDomain.set(domain, next);
  await delay(next - Date.now());
}

/** Oublie l'historique du rate-limit (tests) */
export function resetRateLimit(): void {
  lastRequestByDomain.clear();
}

function toHeaderRecord(headers: HeadersInit | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!headers) return out;
  new Headers(headers).forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

/**
 * Une requête avec retry : le timeout couvre la réponse ET la lecture du corps (read)
 */
async function requestWithRetry<T>(
  url: string,
  options: RequestInit,
  maxRetries: number | undefined,
  read: (res: Response) => Promise<T>
): Promise<T> {
  const config = getScraperConfig();
  const retries = maxRetries ?? config.maxRetries;
  const domain = new URL(url).hostname;

  await rateLimit(domain, config.rateLimitMs);

  const headers: Record<string, string> = {
    "User-Agent": DEFAULT_USER_AGENT,
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9,fr;q=0.8",
    ...toHeaderRecord(options.headers),
  };

  let lastError: Error | null = null;
  for (let i = 0; i <= retries; i++) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.timeoutMs);
    try {
      const res = await fetch(url, {
        ...options,
        headers,
        signal: controller.signal,
      });
      return await read(res);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (process.env.NODE_ENV === "development") {
        // eslint-disable-next-line no-console
        console.log(`[scrapers] ${domain} tentative ${i + 1}/${retries + 1} échouée:`, lastError.message);
      }
      if (i < retries) {
        await delay(config.retryDelayMs * (i + 1));
      }
    } finally {
      clearTimeout(timeout);
    }
  }
  throw lastError ?? new Error("Fetch failed");
}

/**
 * Fetch avec retry, user-agent, timeout (en-têtes de réponse seulement)
 */
export async function fetchWithRetry(
  url: string,
  options: RequestInit = {},
  maxRetries?: number
): Promise<Response> {
  return requestWithRetry(url, options, maxRetries, async (res) => res);
}

/**
 * Récupère le HTML d'une page, corps compris dans le timeout
 */
export async function fetchHtml(url: string): Promise<string> {
  const page = await requestWithRetry(url, {}, undefined, async (res) => ({
    status: res.status,
    ok: res.ok,
    body: res.ok ? await res.text() : "",
  }));
  if (!page.ok) {
    throw new Error(`HTTP ${page.status}: ${url}`);
  }
  return page.body;
}
