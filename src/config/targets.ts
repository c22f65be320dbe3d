import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { TargetNotFoundError } from "../core/errors";
import { TargetConfig } from "./types";

const DEFAULT_FILELIST_PATH = path.resolve(__dirname, "../../data/files_attention.json");

const TargetEntrySchema = z.object({
  save_in: z.string().min(1).default("./fmri/test_attention"),
  article_id: z.coerce.number().int().positive().default(13474629),
  subjects: z.array(z.string()).default([]),
});

const FilelistSchema = z.record(z.string(), z.unknown());

export function resolveFilelistPath(explicitPath?: string, defaultPath = DEFAULT_FILELIST_PATH): string {
  const candidate = explicitPath ? path.resolve(explicitPath) : defaultPath;
  if (fs.existsSync(candidate)) {
    return candidate;
  }
  if (fs.existsSync(defaultPath)) {
    return defaultPath;
  }
  throw new Error(`Filelist not found: ${candidate}`);
}

export function resolveTarget(name: string, filelistPath: string): TargetConfig {
  const raw = fs.readFileSync(filelistPath, "utf-8");
  const filelist = FilelistSchema.parse(JSON.parse(raw));

  if (!Object.prototype.hasOwnProperty.call(filelist, name)) {
    throw new TargetNotFoundError(name, filelistPath, Object.keys(filelist));
  }

  const parsed = TargetEntrySchema.safeParse(filelist[name]);
  if (!parsed.success) {
    throw new Error(`Invalid target '${name}' in ${filelistPath}: ${parsed.error.message}`);
  }

  return {
    name,
    saveIn: parsed.data.save_in,
    articleId: parsed.data.article_id,
    subjects: parsed.data.subjects,
  };
}

export { DEFAULT_FILELIST_PATH };
