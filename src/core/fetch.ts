import { Agent, fetch as undiciFetch, RequestInit, Response } from "undici";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface TimedRequestOptions {
  method: "GET" | "HEAD";
  userAgent: string;
  accept?: string;
  ignoreHttpsErrors: boolean;
  timeoutMs: number;
}

// The timeout stops at response headers; callers own the body.
export async function requestWithTimeout(
  fetchFn: FetchFn,
  url: string,
  options: TimedRequestOptions,
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  try {
    return await fetchFn(url, {
      method: options.method,
      headers: {
        "user-agent": options.userAgent,
        accept: options.accept ?? "*/*",
      },
      dispatcher: getFetchDispatcher(options.ignoreHttpsErrors),
      signal: controller.signal,
      redirect: "follow",
    });
  } finally {
    clearTimeout(timeout);
  }
}
