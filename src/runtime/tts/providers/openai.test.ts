import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { OpenAiSynthesizer } from "./openai";

describe("OpenAiSynthesizer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "openai-speech-test-"));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the returned audio beside the stem", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => {
      return new Response(Buffer.from("openai-audio"), { status: 200 });
    });
    vi.stubGlobal("fetch", fetchMock);

    const synthesizer = new OpenAiSynthesizer({
      apiKey: "test-key",
      model: "gpt-4o-mini-tts",
      voice: "alloy",
      format: "wav",
      timeoutMs: 5000,
    });
    const clip = await synthesizer.render("hello", path.join(dir, "reply"));

    expect(clip).toEqual({
      provider: "openai",
      filePath: path.join(dir, "reply.wav"),
      format: "wav",
      voice: "alloy",
    });
    expect(await readFile(clip.filePath, "utf8")).toBe("openai-audio");
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/audio/speech");
    expect(init.headers).toEqual({
      Authorization: "Bearer test-key",
      "Content-Type": "application/json",
    });
    expect(JSON.parse(String(init.body))).toEqual({
      model: "gpt-4o-mini-tts",
      input: "hello",
      voice: "alloy",
      response_format: "wav",
    });
  });

  it("surfaces API errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("nope", { status: 401 })),
    );
    await expect(
      new OpenAiSynthesizer({ apiKey: "test-key" }).render("hello", path.join(dir, "reply")),
    ).rejects.toThrow("openai speech request failed (401)");
  });

  it("rejects an empty response body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(new Uint8Array(0), { status: 200 })),
    );
    await expect(
      new OpenAiSynthesizer({ apiKey: "test-key" }).render("hello", path.join(dir, "reply")),
    ).rejects.toThrow("openai speech returned no audio");
  });

  it("throws when the api key is missing", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    await expect(new OpenAiSynthesizer({}).render("hello", path.join(dir, "reply"))).rejects.toThrow(
      "openai speech needs voice.tts.openai.apiKey",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
