import { writeFile } from "node:fs/promises";
import type { OpenAiTtsConfig } from "../../../config/schema";
import type { SpeechSynthesizer, SpokenClip } from "../types";

const SPEECH_ENDPOINT = "https://api.openai.com/v1/audio/speech";
const DEFAULT_MODEL = "gpt-4o-mini-tts";
const DEFAULT_VOICE = "alloy";
const DEFAULT_TIMEOUT_MS = 20_000;

export class OpenAiSynthesizer implements SpeechSynthesizer {
  readonly provider = "openai";

  constructor(private readonly config: OpenAiTtsConfig) {}

  async render(text: string, stem: string): Promise<SpokenClip> {
    const apiKey = this.config.apiKey?.trim();
    if (!apiKey) {
      throw new Error("openai speech needs voice.tts.openai.apiKey");
    }
    const format = this.config.format ?? "mp3";
    const voice = this.config.voice ?? DEFAULT_VOICE;

    const response = await fetch(SPEECH_ENDPOINT, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.config.model ?? DEFAULT_MODEL,
        input: text,
        voice,
        response_format: format,
      }),
      signal: AbortSignal.timeout(this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new Error(`openai speech request failed (${response.status})`);
    }

    const audio = Buffer.from(await response.arrayBuffer());
    if (audio.byteLength === 0) {
      throw new Error("openai speech returned no audio");
    }
    const filePath = `${stem}.${format}`;
    await writeFile(filePath, audio);
    return { provider: this.provider, filePath, format, voice };
  }
}
