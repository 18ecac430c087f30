import type { z } from "zod";
import { isTransientStatus } from "../gateway/error-policy";
import { BackendError } from "../gateway/errors";

const ERROR_BODY_PREVIEW_CHARS = 300;

export type JsonRequest = {
  url: string;
  headers: Record<string, string>;
  body: unknown;
  signal: AbortSignal;
};

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

export function joinUrl(base: string, path: string): string {
  return `${trimTrailingSlash(base)}/${path.replace(/^\/+/, "")}`;
}

/** POSTs JSON and validates the reply against `schema`. */
export async function postJson<T extends z.ZodTypeAny>(
  label: string,
  request: JsonRequest,
  schema: T,
): Promise<z.output<T>> {
  const response = await fetch(request.url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...request.headers },
    body: JSON.stringify(request.body),
    signal: request.signal,
  });

  if (!response.ok) {
    const detail = (await response.text().catch(() => "")).slice(0, ERROR_BODY_PREVIEW_CHARS);
    throw new BackendError(
      `${label} API error (${response.status})${detail ? `: ${detail}` : ""}`,
      { transient: isTransientStatus(response.status), status: response.status },
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new BackendError(`${label} returned a body that is not JSON`, {
      transient: false,
      cause: error,
    });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new BackendError(`${label} returned an unexpected response shape`, {
      transient: false,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function requireText(label: string, text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new BackendError(`${label} returned an empty reply`, { transient: false });
  }
  return trimmed;
}
