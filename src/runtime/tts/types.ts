export type TtsProvider = "edge" | "openai";

export type ClipFormat = "mp3" | "wav";

/** A reply rendered to disk, ready for the player. */
export type SpokenClip = {
  provider: TtsProvider;
  filePath: string;
  format: ClipFormat;
  voice: string;
};

/**
 * Renders text to `<stem>.<format>`. The caller owns the directory the stem
 * points into and removes it once the clip has played.
 */
export interface SpeechSynthesizer {
  readonly provider: TtsProvider;
  render(text: string, stem: string): Promise<SpokenClip>;
}
