import type { TtsConfig } from "../../config/schema";
import { logger } from "../../logger";
import { EdgeSynthesizer } from "./providers/edge";
import { OpenAiSynthesizer } from "./providers/openai";
import type { SpeechSynthesizer, SpokenClip, TtsProvider } from "./types";

const DEFAULT_PROVIDER_ORDER: TtsProvider[] = ["edge"];
const DEFAULT_MAX_CHARS = 1500;

/** Builds the enabled synthesizers in `providerOrder`; openai only joins when configured. */
export function createSynthesizers(config: TtsConfig | undefined): SpeechSynthesizer[] {
  const order = config?.providerOrder?.length ? config.providerOrder : DEFAULT_PROVIDER_ORDER;
  const synthesizers: SpeechSynthesizer[] = [];
  for (const provider of order) {
    if (provider === "edge" && config?.edge?.enabled !== false) {
      synthesizers.push(new EdgeSynthesizer(config?.edge));
    }
    if (provider === "openai" && config?.openai && config.openai.enabled !== false) {
      synthesizers.push(new OpenAiSynthesizer(config.openai));
    }
  }
  return synthesizers;
}

/** Hands a reply to each synthesizer in turn until one renders a clip. */
export class TtsService {
  constructor(
    private readonly synthesizers: readonly SpeechSynthesizer[],
    private readonly maxChars: number = DEFAULT_MAX_CHARS,
  ) {}

  static fromConfig(config: TtsConfig | undefined): TtsService {
    return new TtsService(createSynthesizers(config), config?.maxChars ?? DEFAULT_MAX_CHARS);
  }

  async render(text: string, stem: string): Promise<SpokenClip> {
    const spoken = text.trim().slice(0, this.maxChars);
    if (!spoken) {
      throw new Error("TTS input text is empty");
    }

    const errors: Error[] = [];
    for (const synthesizer of this.synthesizers) {
      try {
        return await synthesizer.render(spoken, stem);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(
          { provider: synthesizer.provider, textLength: spoken.length, error: message },
          "TTS provider failed",
        );
        errors.push(new Error(`[${synthesizer.provider}] ${message}`));
      }
    }

    throw new AggregateError(errors, "All TTS providers failed");
  }
}
