export const PROVIDER_FETCH_ERROR_CODES = [
  "TRANSPORT_ERROR",
  "DECODE_ERROR",
  "PARTIAL_FETCH",
  "ALL_SOURCES_FAILED",
] as const;

export type ProviderFetchErrorCode = (typeof PROVIDER_FETCH_ERROR_CODES)[number];

type ProviderFetchErrorDetails = {
  status?: number;
  body?: string;
};

export class ProviderFetchError extends Error {
  code: ProviderFetchErrorCode;
  status: number | null;
  body: string | null;

  constructor(code: ProviderFetchErrorCode, message: string, details: ProviderFetchErrorDetails = {}) {
    super(message);
    this.name = "ProviderFetchError";
    this.code = code;
    this.status = details.status ?? null;
    this.body = details.body ?? null;
  }
}

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
