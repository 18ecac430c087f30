import { execa } from "execa";
import type { PlayerConfig } from "../../config/schema";

const DEFAULT_PLAYBACK_TIMEOUT_MS = 120_000;

/** Plays one audio file with the configured external player. */
export async function playAudioFile(
  filePath: string,
  player: PlayerConfig,
  timeoutMs: number = DEFAULT_PLAYBACK_TIMEOUT_MS,
): Promise<void> {
  const result = await execa(player.command, [...player.args, filePath], {
    timeout: timeoutMs,
    reject: false,
  });
  if (result.exitCode !== 0) {
    const detail = result.stderr?.trim() || `exit code ${result.exitCode ?? "unknown"}`;
    throw new Error(`Audio player '${player.command}' failed: ${detail}`);
  }
}
