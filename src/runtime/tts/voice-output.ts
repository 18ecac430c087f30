import { randomUUID } from "node:crypto";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { PlayerConfig } from "../../config/schema";
import { logger } from "../../logger";
import type { VoiceSink } from "../agent/agent-loop";
import { playAudioFile } from "./player";
import type { TtsService } from "./tts-service";

/**
 * Speaks replies out of band. Clips play one after another; failures are
 * logged and never reach the agent loop.
 */
export class VoiceOutput implements VoiceSink {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly tts: TtsService,
    private readonly player: PlayerConfig,
  ) {}

  speak(text: string): void {
    this.queue = this.queue
      .then(() => this.renderAndPlay(text))
      .catch((error: unknown) => {
        logger.warn(
          { error: error instanceof Error ? error.message : String(error) },
          "Voice output failed",
        );
      });
  }

  /** Resolves once everything queued so far has played. */
  idle(): Promise<void> {
    return this.queue;
  }

  private async renderAndPlay(text: string): Promise<void> {
    const dir = await mkdtemp(path.join(tmpdir(), "swarmcast-voice-"));
    try {
      const clip = await this.tts.render(text, path.join(dir, randomUUID()));
      await playAudioFile(clip.filePath, this.player);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
