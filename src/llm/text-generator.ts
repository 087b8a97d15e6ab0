export type ChatRole = "user" | "assistant";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  systemPrompt: string;
  userMessage: string;
  history?: ChatTurn[];
}

/**
 * Black-box text completion. Everything that talks to a hosted model goes
 * through this, so tests can swap in a stub.
 */
export interface TextGenerator {
  complete(request: CompletionRequest): Promise<string>;
}

/** Append a reference-data block to a system prompt. */
export function withReferenceData(systemPrompt: string, data: string): string {
  if (!data) return systemPrompt;
  return `${systemPrompt}\n\n--- REFERENCE DATA ---\n${data}\n--- END DATA ---`;
}

const FENCE_RE = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```\s*$/;

/**
 * Parse a model reply that is supposed to be JSON. Models sometimes wrap
 * the object in a ```json fence; that is stripped first. Returns null on
 * anything that is not a JSON object.
 */
export function parseJsonReply(reply: string): Record<string, unknown> | null {
  let text = reply.trim();
  const fenced = FENCE_RE.exec(text);
  if (fenced) text = fenced[1].trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return { ...parsed };
}
