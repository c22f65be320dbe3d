import fs from "node:fs";
import path from "node:path";
import { SUBJECT_CODES, SubjectCodeTable } from "../subjects/subjectCodes";
import { AttentionManifest, PruneFailure } from "../types";

export const MANIFEST_FILENAME = "attention_manifest.json";

export function flatFileName(shortCode: string): string {
  return `${shortCode}_attention.h5`;
}

export function allowedEntries(table: SubjectCodeTable = SUBJECT_CODES): Set<string> {
  const allowed = new Set(table.shortCodes().map(flatFileName));
  allowed.add(MANIFEST_FILENAME);
  return allowed;
}

export interface PruneResult {
  pruned: string[];
  failures: PruneFailure[];
}

export async function pruneDirectory(dir: string, allowed: ReadonlySet<string>): Promise<PruneResult> {
  const result: PruneResult = { pruned: [], failures: [] };
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (allowed.has(entry.name)) {
      continue;
    }
    const target = path.join(dir, entry.name);
    try {
      if (entry.isDirectory()) {
        await fs.promises.rm(target, { recursive: true, force: true });
      } else {
        await fs.promises.unlink(target);
      }
      result.pruned.push(entry.name);
    } catch (error) {
      result.failures.push({
        name: entry.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return result;
}

export async function writeManifest(dir: string, manifest: AttentionManifest): Promise<string> {
  const manifestPath = path.join(dir, MANIFEST_FILENAME);
  await fs.promises.writeFile(manifestPath, JSON.stringify(manifest, null, 2) + "\n", "utf-8");
  return manifestPath;
}
