import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EdgeSynthesizer } from "./edge";

type EdgeOptions = { voice: string; outputFormat: string; rate?: string; pitch?: string };

const mocks = vi.hoisted(() => {
  const created: EdgeOptions[] = [];
  return {
    created,
    ttsPromise: vi.fn<(text: string, filePath: string) => Promise<void>>(),
  };
});

vi.mock("node-edge-tts", () => ({
  EdgeTTS: class {
    constructor(options: EdgeOptions) {
      mocks.created.push(options);
    }

    ttsPromise(text: string, filePath: string): Promise<void> {
      return mocks.ttsPromise(text, filePath);
    }
  },
}));

describe("EdgeSynthesizer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "edge-speech-test-"));
    mocks.created.length = 0;
    mocks.ttsPromise.mockReset();
    mocks.ttsPromise.mockImplementation((_text, filePath) => writeFile(filePath, "edge-audio"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("renders an mp3 clip with the default voice", async () => {
    const clip = await new EdgeSynthesizer(undefined).render("hello", path.join(dir, "reply"));

    expect(clip).toEqual({
      provider: "edge",
      filePath: path.join(dir, "reply.mp3"),
      format: "mp3",
      voice: "en-US-AriaNeural",
    });
    expect(mocks.ttsPromise).toHaveBeenCalledWith("hello", path.join(dir, "reply.mp3"));
    expect(mocks.created).toEqual([
      {
        voice: "en-US-AriaNeural",
        outputFormat: "audio-24khz-48kbitrate-mono-mp3",
        rate: undefined,
        pitch: undefined,
      },
    ]);
  });

  it("retries as mp3 when the configured format fails", async () => {
    mocks.ttsPromise.mockRejectedValueOnce(new Error("format unsupported"));
    const synthesizer = new EdgeSynthesizer({
      voice: "en-GB-SoniaNeural",
      format: "riff-24khz-16bit-mono-pcm",
    });

    const clip = await synthesizer.render("hello", path.join(dir, "reply"));

    expect(mocks.created.map((options) => options.outputFormat)).toEqual([
      "riff-24khz-16bit-mono-pcm",
      "audio-24khz-48kbitrate-mono-mp3",
    ]);
    expect(clip.format).toBe("mp3");
    expect(clip.filePath).toBe(path.join(dir, "reply.mp3"));
    expect(clip.voice).toBe("en-GB-SoniaNeural");
  });

  it("rejects an empty clip", async () => {
    mocks.ttsPromise.mockImplementation((_text, filePath) => writeFile(filePath, ""));
    const error = await new EdgeSynthesizer(undefined)
      .render("hello", path.join(dir, "reply"))
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(Error);
    expect(error instanceof Error && error.message).toBe("edge-tts synthesis failed");
    expect(error instanceof Error && error.cause instanceof Error && error.cause.message).toBe(
      "edge-tts wrote an empty clip",
    );
  });
});
