import crypto from "node:crypto";
import fs from "node:fs";
import { ChecksumStatus } from "../types";

const CHUNK_SIZE = 1024 * 1024;

export interface ChecksumResult {
  status: ChecksumStatus;
  expected: string | null;
  actual: string | null;
  error?: string;
}

export async function md5File(filePath: string): Promise<string> {
  const hash = crypto.createHash("md5");
  const stream = fs.createReadStream(filePath, { highWaterMark: CHUNK_SIZE });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export async function verifyChecksum(filePath: string, expected?: string): Promise<ChecksumResult> {
  const normalizedExpected = expected ? expected.trim().toLowerCase() : null;

  let actual: string;
  try {
    actual = await md5File(filePath);
  } catch (error) {
    return {
      status: "error",
      expected: normalizedExpected,
      actual: null,
      error: error instanceof Error ? error.message : String(error),
    };
  }

  if (!normalizedExpected) {
    return { status: "unavailable", expected: null, actual };
  }
  return {
    status: actual === normalizedExpected ? "match" : "mismatch",
    expected: normalizedExpected,
    actual,
  };
}
