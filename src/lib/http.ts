export class HttpError extends Error {
  public readonly status: number;
  public readonly url: string;
  public readonly bodyText: string | undefined;

  constructor(args: { status: number; url: string; bodyText: string | undefined }) {
    super(`HTTP ${args.status} for ${args.url}`);
    this.name = "HttpError";
    this.status = args.status;
    this.url = args.url;
    this.bodyText = args.bodyText;
  }
}

/**
 * POST a JSON body and ignore the response payload. Non-2xx responses raise `HttpError`;
 * the request is aborted after `timeoutMs`.
 */
export async function postJson(
  url: string,
  body: unknown,
  opts?: { timeoutMs?: number; headers?: Record<string, string>; fetchImpl?: typeof fetch }
): Promise<number> {
  const controller = new AbortController();
  const timeoutMs = opts?.timeoutMs ?? 5_000;
  const doFetch = opts?.fetchImpl ?? fetch;
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await doFetch(url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...(opts?.headers ?? {})
      },
      body: JSON.stringify(body),
      signal: controller.signal
    });

    if (!res.ok) {
      const bodyText = await safeReadText(res);
      throw new HttpError({ status: res.status, url, bodyText });
    }
    return res.status;
  } finally {
    clearTimeout(t);
  }
}

async function safeReadText(res: Response): Promise<string | undefined> {
  try {
    return await res.text();
  } catch {
    return undefined;
  }
}
