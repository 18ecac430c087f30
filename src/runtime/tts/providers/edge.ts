import { stat } from "node:fs/promises";
import { EdgeTTS } from "node-edge-tts";
import type { EdgeTtsConfig } from "../../../config/schema";
import type { ClipFormat, SpeechSynthesizer, SpokenClip } from "../types";

type EdgeOutputFormat = NonNullable<EdgeTtsConfig["format"]>;

const MP3_FORMAT: EdgeOutputFormat = "audio-24khz-48kbitrate-mono-mp3";
const DEFAULT_VOICE = "en-US-AriaNeural";

function clipFormatOf(format: EdgeOutputFormat): ClipFormat {
  return format === "riff-24khz-16bit-mono-pcm" ? "wav" : "mp3";
}

/** Edge read-aloud voices. Needs no credentials, so it leads the default order. */
export class EdgeSynthesizer implements SpeechSynthesizer {
  readonly provider = "edge";
  private readonly voice: string;

  constructor(private readonly config: EdgeTtsConfig | undefined) {
    this.voice = config?.voice ?? DEFAULT_VOICE;
  }

  async render(text: string, stem: string): Promise<SpokenClip> {
    const format = this.config?.format ?? MP3_FORMAT;
    try {
      return await this.renderAs(format, text, stem);
    } catch (error) {
      if (format === MP3_FORMAT) {
        throw new Error("edge-tts synthesis failed", { cause: error });
      }
      // Some voices have no PCM output; retry once as mp3.
      return await this.renderAs(MP3_FORMAT, text, stem);
    }
  }

  private async renderAs(format: EdgeOutputFormat, text: string, stem: string): Promise<SpokenClip> {
    const clipFormat = clipFormatOf(format);
    const filePath = `${stem}.${clipFormat}`;
    const edge = new EdgeTTS({
      voice: this.voice,
      outputFormat: format,
      rate: this.config?.rate,
      pitch: this.config?.pitch,
    });
    await edge.ttsPromise(text, filePath);
    const { size } = await stat(filePath);
    if (size === 0) {
      throw new Error("edge-tts wrote an empty clip");
    }
    return { provider: this.provider, filePath, format: clipFormat, voice: this.voice };
  }
}
