import { setTimeout as delay } from "node:timers/promises";
import { logger } from "../../logger";
import type { LlmBackend, PromptContext } from "../backends/types";
import { DefaultGatewayErrorPolicy, type GatewayErrorPolicy } from "./error-policy";
import {
  BackendError,
  BackendTimeoutError,
  BackendUnavailableError,
  describeError,
  GatewayAbortedError,
  GatewayBusyError,
} from "./errors";
import { DEFAULT_BACKOFF, initialRetryState, type RetryState } from "./retry-state";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RequestGatewayOptions = {
  backend: LlmBackend;
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: () => number;
  sleep?: Sleep;
  policy?: GatewayErrorPolicy;
};

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined);
};

function raceAbort<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    task.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Wraps a fallible backend with per-attempt timeouts, bounded retries and
 * cancellation. One request at a time.
 */
export class RequestGateway {
  private readonly policy: GatewayErrorPolicy;
  private readonly sleep: Sleep;
  private busy = false;

  constructor(private readonly options: RequestGatewayOptions) {
    this.policy =
      options.policy ??
      new DefaultGatewayErrorPolicy(
        options.maxRetries,
        {
          baseDelayMs: options.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs,
          maxDelayMs: options.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
        },
        options.jitter,
      );
    this.sleep = options.sleep ?? defaultSleep;
  }

  get inFlight(): boolean {
    return this.busy;
  }

  async generate(prompt: PromptContext, signal?: AbortSignal): Promise<string> {
    if (this.busy) {
      throw new GatewayBusyError();
    }
    this.busy = true;
    try {
      return await this.run(prompt, signal);
    } finally {
      this.busy = false;
    }
  }

  private async run(prompt: PromptContext, signal: AbortSignal | undefined): Promise<string> {
    let state: RetryState = initialRetryState();

    for (;;) {
      if (signal?.aborted) {
        throw new GatewayAbortedError();
      }
      state = { attempt: state.attempt + 1, nextDelayMs: 0 };

      try {
        return await this.attempt(prompt, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new GatewayAbortedError();
        }
        const decision = this.policy.decide(error, state.attempt);
        if (!decision.retry) {
          if (decision.reason === "retries_exhausted") {
            throw new BackendUnavailableError(state.attempt, error);
          }
          throw error instanceof BackendError
            ? error
            : new BackendError(describeError(error), { transient: false, cause: error });
        }

        state = { ...state, nextDelayMs: decision.delayMs };
        logger.warn(
          {
            provider: this.options.backend.provider,
            attempt: state.attempt,
            delayMs: state.nextDelayMs,
            error: describeError(error),
          },
          "Backend request failed; retrying",
        );
      }

      try {
        await this.sleep(state.nextDelayMs, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new GatewayAbortedError();
        }
        throw error;
      }
    }
  }

  private async attempt(prompt: PromptContext, signal: AbortSignal | undefined): Promise<string> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new BackendTimeoutError(this.options.timeoutMs)),
      this.options.timeoutMs,
    );

    try {
      return await raceAbort(this.options.backend.generate(prompt, controller.signal), controller.signal);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
