import { StoreError, errorMessage, isAbortError } from "../errors.js";

export type JsonRequest = {
  /** Collaborator name carried by any StoreError. */
  store: string;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
};

export function bearer(token: string): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * Fetch a JSON document from a collaborator. Status codes map onto
 * StoreError codes: 404 NOT_FOUND, 401/403 UNAUTHORIZED, other non-2xx and
 * unparseable bodies BAD_RESPONSE, network failures and timeouts UNREACHABLE.
 * Aborting the caller's `signal` rethrows the abort reason unchanged.
 */
export async function fetchJson(url: string, req: JsonRequest): Promise<unknown> {
  const timeout = AbortSignal.timeout(req.timeoutMs);
  const signal = req.signal ? AbortSignal.any([req.signal, timeout]) : timeout;

  let res: Response;
  try {
    res = await fetch(url, {
      method: req.method ?? "GET",
      headers: {
        Accept: "application/json",
        ...(req.body !== undefined ? { "Content-Type": "application/json" } : {}),
        ...req.headers,
      },
      body: req.body !== undefined ? JSON.stringify(req.body) : undefined,
      signal,
    });
  } catch (err) {
    if (req.signal?.aborted) throw req.signal.reason;
    const reason = isAbortError(err) ? `timed out after ${req.timeoutMs}ms` : errorMessage(err);
    throw new StoreError(req.store, "UNREACHABLE", `${req.store}: ${url} ${reason}`, { cause: err });
  }

  if (res.status === 404) {
    throw new StoreError(req.store, "NOT_FOUND", `${req.store}: ${url} not found`);
  }
  if (res.status === 401 || res.status === 403) {
    throw new StoreError(req.store, "UNAUTHORIZED", `${req.store}: ${url} answered HTTP ${res.status}`);
  }
  const text = await res.text();
  if (!res.ok) {
    throw new StoreError(req.store, "BAD_RESPONSE", `${req.store}: ${url} answered HTTP ${res.status}: ${text.slice(0, 200)}`);
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new StoreError(req.store, "BAD_RESPONSE", `${req.store}: ${url} returned invalid JSON`, { cause: err });
  }
}
