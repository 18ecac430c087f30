import { BackendError } from "./errors";
import { computeBackoffDelay, DEFAULT_BACKOFF, type BackoffPolicy } from "./retry-state";

const DEFAULT_MAX_RETRIES = 3;

const RECOVERABLE_ERROR_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const TRANSIENT_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);
const PERMANENT_STATUS = new Set([400, 401, 403, 404, 422]);

export type ErrorClass = "transient" | "permanent";

export type GatewayErrorDecision = {
  retry: boolean;
  delayMs: number;
  reason: "transient_error" | "retries_exhausted" | "terminal_error";
};

export interface GatewayErrorPolicy {
  /** `attempt` is the number of attempts already made (1-based). */
  decide(error: unknown, attempt: number): GatewayErrorDecision;
}

export function isTransientError(message: string): boolean {
  const lower = message.toLowerCase();
  return (
    lower.includes("timeout") ||
    lower.includes("timed out") ||
    lower.includes("temporarily unavailable") ||
    lower.includes("fetch failed") ||
    lower.includes("network") ||
    lower.includes("rate limit") ||
    lower.includes("overloaded")
  );
}

function readField(value: object, key: string): unknown {
  return Reflect.get(value, key);
}

function collectErrorChain(error: unknown): object[] {
  const chain: object[] = [];
  const queue: unknown[] = [error];
  const seen = new Set<unknown>();

  while (queue.length > 0) {
    const item = queue.shift();
    if (!item || typeof item !== "object" || seen.has(item)) {
      continue;
    }
    seen.add(item);
    chain.push(item);
    queue.push(readField(item, "cause"), readField(item, "error"));
  }

  return chain;
}

function statusOf(record: object): number | undefined {
  for (const key of ["status", "statusCode"]) {
    const value = readField(record, key);
    if (typeof value === "number" && Number.isInteger(value)) {
      return value;
    }
  }
  return undefined;
}

function codeOf(record: object): string | undefined {
  const value = readField(record, "code");
  return typeof value === "string" && value ? value.toUpperCase() : undefined;
}

/** True when any error in the cause chain carries a socket or DNS failure code. */
export function isRecoverableNetworkError(error: unknown): boolean {
  return collectErrorChain(error).some((record) => {
    const code = codeOf(record);
    return code !== undefined && RECOVERABLE_ERROR_CODES.has(code);
  });
}

export function classifyError(error: unknown): ErrorClass {
  if (error instanceof BackendError) {
    return error.transient ? "transient" : "permanent";
  }

  for (const record of collectErrorChain(error)) {
    const code = codeOf(record);
    if (code && RECOVERABLE_ERROR_CODES.has(code)) {
      return "transient";
    }
    const status = statusOf(record);
    if (status !== undefined) {
      if (TRANSIENT_STATUS.has(status) || (status >= 500 && status < 600)) {
        return "transient";
      }
      if (PERMANENT_STATUS.has(status)) {
        return "permanent";
      }
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return isTransientError(message) ? "transient" : "permanent";
}

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUS.has(status) || (status >= 500 && status < 600);
}

export class DefaultGatewayErrorPolicy implements GatewayErrorPolicy {
  constructor(
    private readonly maxRetries: number = DEFAULT_MAX_RETRIES,
    private readonly backoff: BackoffPolicy = DEFAULT_BACKOFF,
    private readonly jitter: () => number = Math.random,
  ) {}

  decide(error: unknown, attempt: number): GatewayErrorDecision {
    if (classifyError(error) === "permanent") {
      return { retry: false, delayMs: 0, reason: "terminal_error" };
    }
    if (attempt > this.maxRetries) {
      return { retry: false, delayMs: 0, reason: "retries_exhausted" };
    }
    return {
      retry: true,
      delayMs: computeBackoffDelay(attempt, this.backoff, this.jitter()),
      reason: "transient_error",
    };
  }
}
