import { randomUUID } from "crypto";
import type { ServerContext } from "./context.js";
import type { ToolDefinition } from "./tool-registry.js";
import {
  argString,
  argStringOpt,
  formatToolResponse,
  toolError,
} from "./tool-registry.js";
import { createSession, type Session } from "../domain/conversation/session.js";
import type { OrchestratorReply } from "../domain/conversation/orchestrator.js";
import { completenessScore } from "../domain/profile/profile.js";
import { isSupportedLanguage } from "../core/config.js";
import { getErrorMessage, logError } from "../core/logging.js";
import { sessionView } from "./response-formatter.js";

const MAX_MESSAGE_CHARS = 4000;

function loadSession(ctx: ServerContext, sessionId: string): Session {
  const language = ctx.config.languages.defaultLanguage;
  return ctx.sessionStore
    ? ctx.sessionStore.getOrCreate(sessionId, language)
    : createSession(sessionId, language);
}

/** Best-effort: a failed save is logged and reported, never thrown. */
function saveSession(ctx: ServerContext, session: Session): boolean {
  if (!ctx.sessionStore) return false;
  try {
    ctx.sessionStore.save(session);
    return true;
  } catch (err) {
    logError(`Failed to save session ${session.session_id}:`, getErrorMessage(err));
    return false;
  }
}

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "chat",
      description:
        "Send one citizen message to the assistant. Detects intent (greeting, scheme discovery, RTI, financial), extracts profile details, asks profiling questions one at a time, matches schemes once enough is known, drafts RTI applications and flags loan scams. Pass the returned session_id on later turns.",
      inputSchema: {
        type: "object",
        properties: {
          message: { type: "string", description: "The citizen's message." },
          session_id: {
            type: "string",
            description: "Existing session id. Omit to start a new conversation.",
          },
          language: {
            type: "string",
            description:
              "Set the session language (hi, en, ta, te, bn, mr, gu, kn, ml, pa). May be updated by detection on the same turn.",
          },
        },
        required: ["message"],
      },
      handler: async (args, ctx) => {
        const message = argString(args, "message").trim();
        if (!message) return toolError("message is required.");
        if (message.length > MAX_MESSAGE_CHARS) {
          return toolError(`message exceeds ${MAX_MESSAGE_CHARS} characters.`);
        }

        const language = argStringOpt(args, "language");
        if (language !== undefined && !isSupportedLanguage(language, ctx.config.languages.supported)) {
          return toolError(`Unsupported language "${language}".`);
        }

        // One turn at a time per session id: load, process, save.
        const sessionId = argStringOpt(args, "session_id") ?? randomUUID();
        return ctx.sessionTurns.run(sessionId, async () => {
          const session = loadSession(ctx, sessionId);
          if (language !== undefined) session.language = language;

          let reply: OrchestratorReply;
          try {
            reply = await ctx.orchestrator.processMessage(session, message);
          } catch (err) {
            logError("chat failed:", getErrorMessage(err));
            return toolError(`Assistant unavailable: ${getErrorMessage(err)}`);
          }

          return formatToolResponse({
            success: true,
            data: {
              session_id: session.session_id,
              reply: reply.text,
              language: reply.language,
              pillar: reply.pillar,
              schemes: reply.schemes,
              profile_completeness: completenessScore(session.profile),
              persisted: saveSession(ctx, session),
            },
            attribution: "",
          });
        });
      },
    },
    {
      name: "get_session",
      description:
        "Fetch a stored conversation: profile, completeness, matched schemes and message history.",
      inputSchema: {
        type: "object",
        properties: {
          session_id: { type: "string", description: "Session id from chat." },
        },
        required: ["session_id"],
      },
      handler: async (args, ctx) => {
        if (!ctx.sessionStore) {
          return toolError("Session store not available. Check server logs for initialization errors.");
        }
        const sessionId = argString(args, "session_id");
        if (!sessionId) return toolError("session_id is required.");

        const session = ctx.sessionStore.get(sessionId);
        if (!session) return toolError(`Session "${sessionId}" not found or expired.`);

        return formatToolResponse({
          success: true,
          data: sessionView(session),
          attribution: "",
        });
      },
    },
    {
      name: "delete_session",
      description: "Erase a stored conversation and everything learned in it.",
      inputSchema: {
        type: "object",
        properties: {
          session_id: { type: "string", description: "Session id to erase." },
        },
        required: ["session_id"],
      },
      handler: async (args, ctx) => {
        if (!ctx.sessionStore) {
          return toolError("Session store not available. Check server logs for initialization errors.");
        }
        const sessionId = argString(args, "session_id");
        if (!sessionId) return toolError("session_id is required.");

        return formatToolResponse({
          success: true,
          data: { session_id: sessionId, deleted: ctx.sessionStore.delete(sessionId) },
          attribution: "",
        });
      },
    },
  ];
}
