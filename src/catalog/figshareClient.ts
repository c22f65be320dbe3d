import { z } from "zod";
import { AppConfig } from "../config";
import { CatalogFetchError } from "../core/errors";
import { defaultFetch, FetchFn, requestWithTimeout } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { CatalogEntry } from "../types";

interface CatalogDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
}

const RemoteFileSchema = z
  .object({
    name: z.string().optional(),
    download_url: z.string().optional(),
    url: z.string().optional(),
    supplied_url: z.string().optional(),
    md5: z.string().nullish(),
    computed_md5: z.string().nullish(),
    supplied_md5: z.string().nullish(),
    size: z.number().optional(),
  })
  .passthrough();

const ArticleSchema = z
  .object({
    files: z.array(RemoteFileSchema).nullish(),
  })
  .passthrough();

type RemoteFile = z.infer<typeof RemoteFileSchema>;

function firstNonEmpty(...values: Array<string | null | undefined>): string | undefined {
  return values.find((value): value is string => typeof value === "string" && value.trim().length > 0);
}

export function articleUrl(apiBaseUrl: string, articleId: number): string {
  return `${apiBaseUrl.replace(/\/+$/, "")}/articles/${articleId}`;
}

export function toCatalogEntry(file: RemoteFile): CatalogEntry | undefined {
  const name = firstNonEmpty(file.name);
  const downloadUrl = firstNonEmpty(file.download_url, file.url, file.supplied_url);
  if (!name || !downloadUrl) {
    return undefined;
  }
  return {
    name,
    downloadUrl,
    md5: firstNonEmpty(file.md5, file.computed_md5, file.supplied_md5)?.toLowerCase(),
    size: file.size,
  };
}

export async function fetchArticleFiles(articleId: number, deps: CatalogDeps): Promise<CatalogEntry[]> {
  const { config, logger, metrics } = deps;
  const url = articleUrl(config.apiBaseUrl, articleId);
  const stopTimer = metrics.startTimer("catalog_fetch_ms");
  logger.info("catalog_fetch_start", { articleId, url });

  const response = await requestWithTimeout(deps.fetchFn ?? defaultFetch, url, {
    method: "GET",
    userAgent: config.userAgent,
    accept: "application/json",
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    timeoutMs: config.requestTimeoutMs,
  });

  if (!response.ok) {
    throw new CatalogFetchError(`Catalog request for article ${articleId} failed: HTTP ${response.status}`, response.status);
  }

  const parsed = ArticleSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new CatalogFetchError(`Unexpected catalog payload for article ${articleId}: ${parsed.error.message}`);
  }

  const entries: CatalogEntry[] = [];
  for (const file of parsed.data.files ?? []) {
    const entry = toCatalogEntry(file);
    if (entry) {
      entries.push(entry);
    }
  }

  const durationMs = stopTimer();
  metrics.incrementCounter("catalog_files", entries.length);
  logger.info("catalog_fetch_complete", { articleId, files: entries.length, durationMs });
  return entries;
}
