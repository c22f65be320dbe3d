import { ShortCode, SubjectId } from "../subjects/subjectCodes";

export interface CatalogEntry {
  name: string;
  downloadUrl: string;
  md5?: string;
  size?: number;
}

export interface SelectedEntry extends CatalogEntry {
  subject: SubjectId;
  shortCode: ShortCode;
}

export type ChecksumStatus = "match" | "mismatch" | "unavailable" | "error";

export interface ManifestRecord {
  api_name: string;
  saved_as: string;
  subject_S: ShortCode;
  download_url: string;
  md5_remote: string | null;
  md5_local: string | null;
  md5_status: ChecksumStatus;
  downloaded: boolean;
}

export interface PruneFailure {
  name: string;
  error: string;
}

export interface AttentionManifest {
  figshare_article_id: number;
  dest_root: string;
  S_to_sub: Record<string, SubjectId>;
  sub_to_S: Record<string, ShortCode>;
  downloaded: ManifestRecord[];
  pruned: string[];
  prune_failed: PruneFailure[];
}
