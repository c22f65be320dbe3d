import fs from "node:fs";
import path from "node:path";
import { fetchArticleFiles, selectCatalogEntries } from "../catalog";
import { AppConfig, TargetConfig } from "../config";
import { downloadFile } from "../download/downloader";
import { ProgressReporter } from "../download/progress";
import { allowedEntries, flatFileName, pruneDirectory, writeManifest } from "../normalize/directory";
import { Logger, MetricsRegistry } from "../observability";
import { resolveSubjects, SUBJECT_CODES } from "../subjects/subjectCodes";
import { AttentionManifest, ManifestRecord, SelectedEntry } from "../types";
import { verifyChecksum } from "../verify/checksum";
import { FetchFn } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  progress: ProgressReporter;
  fetchFn?: FetchFn;
}

export type FetchRunOutcome =
  | { status: "no_matches"; destRoot: string }
  | { status: "completed"; destRoot: string; manifestPath: string; manifest: AttentionManifest };

async function fetchAndVerify(ctx: CommandContext, entry: SelectedEntry, destRoot: string): Promise<ManifestRecord> {
  const outputPath = path.join(destRoot, flatFileName(entry.shortCode));
  const outcome = await downloadFile(entry.downloadUrl, outputPath, {
    config: ctx.config,
    logger: ctx.logger.child("download"),
    metrics: ctx.metrics,
    progress: ctx.progress,
    fetchFn: ctx.fetchFn,
  });

  const stopTimer = ctx.metrics.startTimer("checksum_ms");
  const checksum = await verifyChecksum(outputPath, entry.md5);
  const durationMs = stopTimer();
  const fields = { file: entry.name, shortCode: entry.shortCode, expected: checksum.expected, actual: checksum.actual };

  switch (checksum.status) {
    case "match":
      ctx.logger.info("checksum_ok", { ...fields, durationMs });
      break;
    case "mismatch":
      ctx.metrics.incrementCounter("checksum_mismatches");
      ctx.logger.warn("checksum_mismatch", fields);
      break;
    case "unavailable":
      ctx.metrics.incrementCounter("checksums_unavailable");
      ctx.logger.warn("checksum_unavailable", fields);
      break;
    case "error":
      ctx.metrics.incrementCounter("checksum_errors");
      ctx.logger.warn("checksum_error", { ...fields, error: checksum.error });
      break;
  }

  return {
    api_name: entry.name,
    saved_as: outputPath,
    subject_S: entry.shortCode,
    download_url: entry.downloadUrl,
    md5_remote: entry.md5 ?? null,
    md5_local: checksum.actual,
    md5_status: checksum.status,
    downloaded: outcome.status === "downloaded",
  };
}

export async function runAttentionFetch(ctx: CommandContext, target: TargetConfig): Promise<FetchRunOutcome> {
  const destRoot = path.resolve(target.saveIn);
  fs.mkdirSync(destRoot, { recursive: true });

  const wanted = new Set(resolveSubjects(target.subjects));
  ctx.logger.info("fetch_start", {
    target: target.name,
    articleId: target.articleId,
    destRoot,
    subjects: [...wanted],
  });

  const files = await fetchArticleFiles(target.articleId, {
    config: ctx.config,
    logger: ctx.logger.child("catalog"),
    metrics: ctx.metrics,
    fetchFn: ctx.fetchFn,
  });
  const chosen = selectCatalogEntries(files, wanted);
  ctx.metrics.incrementCounter("files_matched", chosen.length);

  if (chosen.length === 0) {
    ctx.logger.info("no_matching_files", { articleId: target.articleId, catalogFiles: files.length });
    return { status: "no_matches", destRoot };
  }

  const records: ManifestRecord[] = [];
  for (const entry of chosen) {
    records.push(await fetchAndVerify(ctx, entry, destRoot));
  }

  const pruneResult = await pruneDirectory(destRoot, allowedEntries());
  ctx.metrics.incrementCounter("entries_pruned", pruneResult.pruned.length);
  ctx.metrics.incrementCounter("prune_failures", pruneResult.failures.length);
  for (const failure of pruneResult.failures) {
    ctx.logger.warn("prune_failed", { file: failure.name, error: failure.error });
  }

  const manifest: AttentionManifest = {
    figshare_article_id: target.articleId,
    dest_root: destRoot,
    S_to_sub: SUBJECT_CODES.shortToSubjectRecord(),
    sub_to_S: SUBJECT_CODES.subjectToShortRecord(),
    downloaded: records,
    pruned: pruneResult.pruned,
    prune_failed: pruneResult.failures,
  };
  const manifestPath = await writeManifest(destRoot, manifest);

  for (const shortCode of [...SUBJECT_CODES.shortCodes()].sort()) {
    const filePath = path.join(destRoot, flatFileName(shortCode));
    ctx.logger.info("attention_file_status", {
      shortCode,
      file: filePath,
      state: fs.existsSync(filePath) ? "OK" : "MISSING",
    });
  }
  if (pruneResult.pruned.length > 0) {
    ctx.logger.info("extras_removed", { pruned: pruneResult.pruned });
  }
  ctx.logger.info("fetch_complete", { destRoot, manifestPath, files: records.length });

  return { status: "completed", destRoot, manifestPath, manifest };
}
