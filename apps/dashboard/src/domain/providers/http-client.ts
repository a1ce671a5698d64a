import { truncateText } from "@spendtop/shared";
import type { z } from "zod";

import { ProviderFetchError } from "./provider-error";

const ERROR_BODY_PREVIEW_LENGTH = 200;

export type QueryValue = string | number | readonly string[];

export type JsonRequest = {
  label: string;
  url: string;
  query?: Record<string, QueryValue | undefined>;
  headers: Record<string, string>;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

export const buildRequestUrl = (url: string, query: JsonRequest["query"] = {}) => {
  const target = new URL(url);
  Object.entries(query).forEach(([key, value]) => {
    if (value === undefined) {
      return;
    }
    if (typeof value === "string" || typeof value === "number") {
      target.searchParams.append(key, String(value));
      return;
    }
    value.forEach((item) => target.searchParams.append(key, item));
  });
  return target.toString();
};

const readBody = async (response: Response, label: string) => {
  try {
    return await response.text();
  } catch (error) {
    throw new ProviderFetchError(
      "TRANSPORT_ERROR",
      `${label}: failed to read response body (${error instanceof Error ? error.message : "unknown"})`,
      { status: response.status },
    );
  }
};

/**
 * GETs a JSON document and validates it against `schema`.
 * Timeouts and network failures surface as TRANSPORT_ERROR; unparsable or
 * unexpected bodies as DECODE_ERROR.
 */
export const requestJson = async <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  { label, url, query, headers, timeoutMs, fetchImpl = fetch }: JsonRequest,
): Promise<T> => {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => {
    controller.abort();
  }, timeoutMs);
  try {
    let response: Response;
    try {
      response = await fetchImpl(buildRequestUrl(url, query), {
        method: "GET",
        headers: { Accept: "application/json", ...headers },
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new ProviderFetchError("TRANSPORT_ERROR", `${label}: request timed out after ${timeoutMs}ms`);
      }
      throw new ProviderFetchError(
        "TRANSPORT_ERROR",
        `${label}: request failed (${error instanceof Error ? error.message : "unknown"})`,
      );
    }

    const text = await readBody(response, label);
    const preview = truncateText(text, ERROR_BODY_PREVIEW_LENGTH);
    if (!response.ok) {
      throw new ProviderFetchError("TRANSPORT_ERROR", `${label}: HTTP ${response.status} - ${preview}`, {
        status: response.status,
        body: preview,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new ProviderFetchError("DECODE_ERROR", `${label}: response is not JSON: ${preview}`, {
        status: response.status,
        body: preview,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const pathLabel = issue?.path.join(".") || "(root)";
      const detail = issue?.message ?? "validation failed";
      throw new ProviderFetchError(
        "DECODE_ERROR",
        `${label}: unexpected response at ${pathLabel} (${detail}): ${preview}`,
        { status: response.status, body: preview },
      );
    }
    return parsed.data;
  } finally {
    clearTimeout(timeoutHandle);
  }
};

export type Page<T> = {
  items: T[];
  hasMore: boolean;
  nextCursor: string | null;
};

/**
 * Follows a cursor until the server reports no more pages, stops returning a
 * cursor, or `maxPages` requests have been made. Pages are fetched in order;
 * the first failing page rejects the whole call.
 */
export const paginate = async <T>(
  fetchPage: (cursor: string | null) => Promise<Page<T>>,
  maxPages: number,
): Promise<T[]> => {
  const items: T[] = [];
  let cursor: string | null = null;
  for (let pageIndex = 0; pageIndex < maxPages; pageIndex += 1) {
    const page = await fetchPage(cursor);
    items.push(...page.items);
    if (!page.hasMore || !page.nextCursor) {
      break;
    }
    cursor = page.nextCursor;
  }
  return items;
};
