import { FetchError, ParseError } from "./errors.js";

export interface JsonResponse {
  status: number;
  body: unknown;
}

/**
 * GET a JSON document. Network failures and non-success statuses become
 * `FetchError`, a body that is not JSON becomes `ParseError`.
 */
export async function getJson(url: URL | string, label: string): Promise<JsonResponse> {
  let res: Response;
  try {
    res = await fetch(url);
  } catch (err) {
    throw new FetchError(`Failed to fetch ${label}: ${err instanceof Error ? err.message : String(err)}`, url.toString(), undefined, { cause: err });
  }

  if (!res.ok) {
    throw new FetchError(`Failed to fetch ${label}: ${res.status} ${res.statusText}`, url.toString(), res.status);
  }

  const text = await res.text();
  try {
    return { status: res.status, body: JSON.parse(text) };
  } catch {
    throw new ParseError("body", text.slice(0, 100), `Response for ${label} is not JSON`);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
