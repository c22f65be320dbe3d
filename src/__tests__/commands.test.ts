import fs from "node:fs";
import path from "node:path";
import { Response } from "undici";
import { afterEach, describe, it, expect, vi } from "vitest";
import { TargetConfig } from "../config";
import { CommandContext, runAttentionFetch } from "../core/commands";
import { NoopProgressReporter } from "../download/progress";
import { MANIFEST_FILENAME } from "../normalize/directory";
import { MetricsRegistry } from "../observability";
import { SubjectValidationError } from "../core/errors";
import { createFakeFetch, jsonResponse, makeTempDir, md5Hex, quietLogger, testConfig } from "./helpers";

const ARTICLE_URL = "https://api.example.test/v2/articles/13474629";
const SUB01_URL = "https://files.example.test/sub-01";
const SUB06_URL = "https://files.example.test/sub-06";

function catalogRoutes() {
  return {
    [`GET ${ARTICLE_URL}`]: () =>
      jsonResponse({
        files: [
          { name: "sub-01_attention_vc.h5", download_url: SUB01_URL, md5: md5Hex("subject one") },
          { name: "sub-06_attention_vc.h5", download_url: SUB06_URL, computed_md5: "0".repeat(32) },
          { name: "sub-99_other.h5", download_url: "https://files.example.test/sub-99" },
          { name: "README.txt", download_url: "https://files.example.test/readme" },
        ],
      }),
    [`GET ${SUB01_URL}`]: () => new Response("subject one"),
    [`GET ${SUB06_URL}`]: () => new Response("subject six"),
  };
}

function makeContext(fetchFn: CommandContext["fetchFn"]): CommandContext {
  return {
    runId: "test-run",
    config: testConfig,
    logger: quietLogger(),
    metrics: new MetricsRegistry(),
    progress: new NoopProgressReporter(),
    fetchFn,
  };
}

function makeTarget(saveIn: string, subjects: string[] = []): TargetConfig {
  return { name: "fmri_attention", saveIn, articleId: 13474629, subjects };
}

function readManifestFile(dir: string) {
  return JSON.parse(fs.readFileSync(path.join(dir, MANIFEST_FILENAME), "utf-8"));
}

describe("runAttentionFetch", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("leaves only the flat files and the manifest", async () => {
    const dir = makeTempDir();
    fs.writeFileSync(path.join(dir, "stray.txt"), "left over");
    fs.mkdirSync(path.join(dir, "nested"));
    fs.writeFileSync(path.join(dir, "nested", "inner.h5"), "old");

    const outcome = await runAttentionFetch(makeContext(createFakeFetch(catalogRoutes())), makeTarget(dir));

    expect(outcome.status).toBe("completed");
    expect(fs.readdirSync(dir).sort()).toEqual(["S1_attention.h5", "S4_attention.h5", MANIFEST_FILENAME]);
    expect(fs.readFileSync(path.join(dir, "S4_attention.h5"), "utf-8")).toBe("subject one");

    const manifest = readManifestFile(dir);
    expect(manifest.pruned).toEqual(["nested", "stray.txt"]);
    expect(manifest.prune_failed).toEqual([]);
    expect(manifest.figshare_article_id).toBe(13474629);
    expect(manifest.dest_root).toBe(dir);
    expect(manifest.S_to_sub).toEqual({ S1: "sub-06", S2: "sub-07", S3: "sub-04", S4: "sub-01" });
  });

  it("records a checksum mismatch and still writes the manifest", async () => {
    const dir = makeTempDir();
    const ctx = makeContext(createFakeFetch(catalogRoutes()));

    await runAttentionFetch(ctx, makeTarget(dir));

    const manifest = readManifestFile(dir);
    expect(manifest.downloaded).toEqual([
      {
        api_name: "sub-01_attention_vc.h5",
        saved_as: path.join(dir, "S4_attention.h5"),
        subject_S: "S4",
        download_url: SUB01_URL,
        md5_remote: md5Hex("subject one"),
        md5_local: md5Hex("subject one"),
        md5_status: "match",
        downloaded: true,
      },
      {
        api_name: "sub-06_attention_vc.h5",
        saved_as: path.join(dir, "S1_attention.h5"),
        subject_S: "S1",
        download_url: SUB06_URL,
        md5_remote: "0".repeat(32),
        md5_local: md5Hex("subject six"),
        md5_status: "mismatch",
        downloaded: true,
      },
    ]);
    expect(ctx.metrics.getCounter("checksum_mismatches")).toBe(1);
  });

  it("counts a file that cannot be read back for hashing", async () => {
    const dir = makeTempDir();
    const ctx = makeContext(createFakeFetch(catalogRoutes()));
    vi.spyOn(fs, "createReadStream").mockImplementationOnce(() => {
      throw new Error("EACCES: permission denied");
    });

    await runAttentionFetch(ctx, makeTarget(dir, ["S4"]));

    const manifest = readManifestFile(dir);
    expect(manifest.downloaded).toHaveLength(1);
    expect(manifest.downloaded[0]).toMatchObject({ subject_S: "S4", md5_local: null, md5_status: "error" });
    expect(ctx.metrics.getCounter("checksum_errors")).toBe(1);
    expect(ctx.metrics.getCounter("checksum_mismatches")).toBe(0);
  });

  it("only fetches the catalog on a second run", async () => {
    const dir = makeTempDir();
    const fetchFn = createFakeFetch(catalogRoutes());

    await runAttentionFetch(makeContext(fetchFn), makeTarget(dir));
    fetchFn.mockClear();
    await runAttentionFetch(makeContext(fetchFn), makeTarget(dir));

    expect(fetchFn.mock.calls.map(([url]) => url)).toEqual([ARTICLE_URL]);
    expect(readManifestFile(dir).downloaded.map((record: { downloaded: boolean }) => record.downloaded)).toEqual([
      false,
      false,
    ]);
  });

  it("restricts downloads to the requested subjects", async () => {
    const dir = makeTempDir();

    const outcome = await runAttentionFetch(makeContext(createFakeFetch(catalogRoutes())), makeTarget(dir, ["sub-06"]));

    expect(outcome.status).toBe("completed");
    expect(fs.readdirSync(dir).sort()).toEqual(["S1_attention.h5", MANIFEST_FILENAME]);
  });

  it("stops cleanly without a manifest when nothing matches", async () => {
    const dir = makeTempDir();
    fs.writeFileSync(path.join(dir, "stray.txt"), "left over");
    const fetchFn = createFakeFetch({
      [`GET ${ARTICLE_URL}`]: () => jsonResponse({ files: [{ name: "notes.txt", download_url: "https://x" }] }),
    });

    const outcome = await runAttentionFetch(makeContext(fetchFn), makeTarget(dir));

    expect(outcome).toEqual({ status: "no_matches", destRoot: dir });
    expect(fs.readdirSync(dir)).toEqual(["stray.txt"]);
  });

  it("rejects an unknown subject before touching the network", async () => {
    const dir = makeTempDir();
    const fetchFn = createFakeFetch(catalogRoutes());

    await expect(runAttentionFetch(makeContext(fetchFn), makeTarget(dir, ["sub-03"]))).rejects.toBeInstanceOf(
      SubjectValidationError,
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
