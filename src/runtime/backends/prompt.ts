import type { ConversationEntry } from "../memory/conversation-memory";
import type { ChatTurn, PromptContext } from "./types";

export const OPENING_USER_TURN = "The conversation is just starting. Say something to open it.";

export function formatPeerTurn(peerId: string, content: string): string {
  return `[${peerId}]: ${content}`;
}

/**
 * Maps a memory snapshot onto a chat prompt: the pinned entry becomes the
 * system prompt, own messages become assistant turns and peer messages user
 * turns prefixed with the sender id.
 */
export function buildPrompt(snapshot: readonly ConversationEntry[]): PromptContext {
  let systemPrompt = "";
  const history: ChatTurn[] = [];

  for (const entry of snapshot) {
    switch (entry.role) {
      case "system":
        systemPrompt = entry.content;
        break;
      case "self":
        history.push({ role: "assistant", content: entry.content });
        break;
      case "peer":
        history.push({ role: "user", content: formatPeerTurn(entry.peerId, entry.content) });
        break;
    }
  }

  if (history.length === 0 || history[0].role === "assistant") {
    history.unshift({ role: "user", content: OPENING_USER_TURN });
  }
  return { systemPrompt, history };
}

/** Joins runs of same-role turns for APIs that require strict alternation. */
export function mergeConsecutiveTurns(history: readonly ChatTurn[]): ChatTurn[] {
  const merged: ChatTurn[] = [];
  for (const turn of history) {
    const last = merged.at(-1);
    if (last && last.role === turn.role) {
      last.content = `${last.content}\n\n${turn.content}`;
    } else {
      merged.push({ ...turn });
    }
  }
  return merged;
}
