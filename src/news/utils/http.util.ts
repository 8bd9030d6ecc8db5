export interface SafeFetchParams {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface SafeFetchResult {
  ok: boolean;
  /** 0 when the request never produced a response (network error, timeout). */
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

export async function safeFetch(
  url: string,
  params: SafeFetchParams,
): Promise<SafeFetchResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

  try {
    const res = await fetch(url, {
      method: params.method,
      headers: params.headers,
      body: params.body,
      signal: controller.signal,
    });
    const raw = await res.text();
    return {
      ok: res.ok,
      status: res.status,
      raw,
      json: tryParseRecord(raw),
    };
  } catch (error) {
    const message = controller.signal.aborted
      ? `timed out after ${params.timeoutMs}ms`
      : error instanceof Error
        ? error.message
        : String(error);
    return {
      ok: false,
      status: 0,
      raw: message,
      json: null,
    };
  } finally {
    clearTimeout(timeout);
  }
}

export function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function tryParseRecord(raw: string): Record<string, unknown> | null {
  const trimmed = raw.trimStart();
  if (!trimmed.startsWith('{')) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return asRecord(parsed);
  } catch {
    return null;
  }
}
