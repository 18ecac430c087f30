import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const loggerMock = vi.hoisted(() => ({
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
}));

vi.mock("../../logger", () => ({ logger: loggerMock }));

import { registerProcessErrorHandlers } from "./process-error-handlers";

function networkError(code: string): Error {
  return Object.assign(new Error("socket hang up"), { code });
}

describe("registerProcessErrorHandlers", () => {
  let rejectionBefore: NodeJS.UnhandledRejectionListener[];
  let exceptionBefore: NodeJS.UncaughtExceptionListener[];
  let savedExitCode: typeof process.exitCode;

  function added<T>(before: T[], after: T[]): T[] {
    return after.filter((listener) => !before.includes(listener));
  }

  beforeEach(() => {
    globalThis.__swarmcastProcessErrorHandlersRegistered = undefined;
    rejectionBefore = process.listeners("unhandledRejection");
    exceptionBefore = process.listeners("uncaughtException");
    savedExitCode = process.exitCode;
    loggerMock.warn.mockReset();
    loggerMock.error.mockReset();
    loggerMock.fatal.mockReset();
  });

  afterEach(() => {
    for (const listener of added(rejectionBefore, process.listeners("unhandledRejection"))) {
      process.removeListener("unhandledRejection", listener);
    }
    for (const listener of added(exceptionBefore, process.listeners("uncaughtException"))) {
      process.removeListener("uncaughtException", listener);
    }
    process.exitCode = savedExitCode;
    globalThis.__swarmcastProcessErrorHandlersRegistered = undefined;
  });

  it("registers once", () => {
    registerProcessErrorHandlers();
    registerProcessErrorHandlers();

    expect(added(rejectionBefore, process.listeners("unhandledRejection"))).toHaveLength(1);
    expect(added(exceptionBefore, process.listeners("uncaughtException"))).toHaveLength(1);
  });

  it("downgrades network rejections to warnings", () => {
    registerProcessErrorHandlers();
    const [onRejection] = added(rejectionBefore, process.listeners("unhandledRejection"));

    onRejection(new Error("request failed", { cause: networkError("ECONNRESET") }), Promise.resolve());
    onRejection(new Error("boom"), Promise.resolve());

    expect(loggerMock.warn).toHaveBeenCalledWith(
      { error: "request failed", recoverable: true },
      "Suppressed recoverable unhandled rejection",
    );
    expect(loggerMock.error).toHaveBeenCalledWith({ error: "boom" }, "Unhandled rejection");
  });

  it("treats other uncaught exceptions as fatal", () => {
    registerProcessErrorHandlers();
    const [onException] = added(exceptionBefore, process.listeners("uncaughtException"));

    onException(networkError("EHOSTUNREACH"), "uncaughtException");
    expect(process.exitCode).toBe(savedExitCode);

    onException(new TypeError("undefined is not a function"), "uncaughtException");
    expect(loggerMock.fatal).toHaveBeenCalledWith(
      { error: "undefined is not a function" },
      "Uncaught exception",
    );
    expect(process.exitCode).toBe(1);
  });
});
