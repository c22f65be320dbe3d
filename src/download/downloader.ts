import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { Readable } from "node:stream";
import { AppConfig } from "../config";
import { DownloadError } from "../core/errors";
import { defaultFetch, FetchFn, requestWithTimeout } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { NoopProgressReporter, ProgressReporter } from "./progress";

export interface DownloaderDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  progress?: ProgressReporter;
  fetchFn?: FetchFn;
}

export type DownloadOutcome =
  | { status: "skipped"; path: string }
  | { status: "downloaded"; path: string; bytes: number; durationMs: number };

function parseContentLength(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

async function fetchContentLength(url: string, deps: DownloaderDeps, fetchFn: FetchFn): Promise<number | undefined> {
  try {
    const response = await requestWithTimeout(fetchFn, url, {
      method: "HEAD",
      userAgent: deps.config.userAgent,
      ignoreHttpsErrors: deps.config.ignoreHttpsErrors,
      timeoutMs: deps.config.requestTimeoutMs,
    });
    if (!response.ok) {
      deps.logger.debug("download_size_check_http", { url, statusCode: response.status });
      return undefined;
    }
    return parseContentLength(response.headers.get("content-length"));
  } catch (error) {
    deps.logger.warn("download_size_check_failed", {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

export async function downloadFile(url: string, outputPath: string, deps: DownloaderDeps): Promise<DownloadOutcome> {
  const { config, logger, metrics } = deps;
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const progress = deps.progress ?? new NoopProgressReporter();

  if (fs.existsSync(outputPath)) {
    logger.info("download_skipped_exists", { url, file: outputPath });
    metrics.incrementCounter("downloads_skipped");
    return { status: "skipped", path: outputPath };
  }

  const totalBytes = progress.enabled ? await fetchContentLength(url, deps, fetchFn) : undefined;
  const stopTimer = metrics.startTimer("download_ms");
  logger.info("download_start", { url, file: outputPath, totalBytes });

  const response = await requestWithTimeout(fetchFn, url, {
    method: "GET",
    userAgent: config.userAgent,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    timeoutMs: config.downloadTimeoutMs,
  });

  if (!response.ok) {
    throw new DownloadError(url, `HTTP ${response.status}`, response.status);
  }
  if (!response.body) {
    throw new DownloadError(url, "Empty response body", response.status);
  }

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  const tempPath = `${outputPath}.part`;
  const handle = progress.start(path.basename(outputPath), totalBytes);
  let bytes = 0;

  const writable = fs.createWriteStream(tempPath, { flags: "w" });
  const readable = Readable.fromWeb(response.body);
  readable.on("data", (chunk: Buffer) => {
    bytes += chunk.length;
    handle.advance(chunk.length);
  });

  try {
    await pipeline(readable, writable);
    fs.renameSync(tempPath, outputPath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  } finally {
    handle.finish();
  }

  const durationMs = stopTimer();
  metrics.incrementCounter("downloads_ok");
  logger.info("download_complete", { url, file: outputPath, bytes, durationMs });
  return { status: "downloaded", path: outputPath, bytes, durationMs };
}
