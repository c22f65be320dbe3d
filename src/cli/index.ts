import { loadConfig, resolveFilelistPath, resolveTarget } from "../config";
import { runAttentionFetch } from "../core/commands";
import { FetchFn } from "../core/fetch";
import { createProgressReporter } from "../download/progress";
import { createRunId, Logger, MetricsRegistry } from "../observability";

export interface ParsedCliArgs {
  target?: string;
  filelistPath?: string;
  configPath?: string;
  ignoreHttpsErrors: boolean;
  noProgress: boolean;
}

export interface CliDeps {
  fetchFn?: FetchFn;
  env?: NodeJS.ProcessEnv;
}

const HELP_TEXT = `
Usage:
  attention-fetch [target] [options]

Downloads the attention fMRI files of a filelist target, verifies their MD5
checksums and leaves only S1..S4_attention.h5 plus attention_manifest.json in
the target's save_in directory.

Arguments:
  target                 Filelist entry to fetch (default: fmri_attention)

Options:
  --filelist <path>      Path to files_attention.json (default: bundled data/files_attention.json)
  --config <path>        Optional path to JSON config file
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --no-progress          Do not report download progress
  -h, --help             Show this help
`;

const VALUE_FLAGS = new Set(["--filelist", "--config"]);

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const parsed: ParsedCliArgs = { ignoreHttpsErrors: false, noProgress: false };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[index + 1];
      if (!value || value.startsWith("-")) {
        throw new Error(`Missing value for ${arg}`);
      }
      if (arg === "--filelist") {
        parsed.filelistPath = value;
      } else {
        parsed.configPath = value;
      }
      index += 1;
      continue;
    }
    if (arg === "--ignore-https-errors") {
      parsed.ignoreHttpsErrors = true;
      continue;
    }
    if (arg === "--no-progress") {
      parsed.noProgress = true;
      continue;
    }
    if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (parsed.target !== undefined) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    parsed.target = arg;
  }
  return parsed;
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath, deps.env);
  if (parsed.ignoreHttpsErrors) {
    config = { ...config, ignoreHttpsErrors: true };
  }
  if (parsed.noProgress) {
    config = { ...config, progressMode: "none" };
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const targetName = parsed.target ?? config.defaultTarget;
  const filelistPath = resolveFilelistPath(parsed.filelistPath);
  const target = resolveTarget(targetName, filelistPath);

  logger.info("command_start", {
    target: targetName,
    filelistPath,
    articleId: target.articleId,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    progressMode: config.progressMode,
  });

  try {
    const outcome = await runAttentionFetch(
      {
        runId,
        config,
        logger: logger.child("fetch"),
        metrics,
        progress: createProgressReporter(config.progressMode, logger.child("progress")),
        fetchFn: deps.fetchFn,
      },
      target,
    );
    logger.info("command_complete", { target: targetName, status: outcome.status });
    return 0;
  } finally {
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
