export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  articleId?: number;
  url?: string;
  file?: string;
  shortCode?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "catalog_files"
  | "files_matched"
  | "downloads_ok"
  | "downloads_skipped"
  | "checksum_mismatches"
  | "checksums_unavailable"
  | "checksum_errors"
  | "entries_pruned"
  | "prune_failures";

export type MetricTimerName = "catalog_fetch_ms" | "download_ms" | "checksum_ms";
