import { z } from "zod";
import { ErrorResponse, InvalidRequestError, ProtocolError, formatIssues, invalidAction } from "../util/errors.js";
import { ToolSpec } from "../util/toolDefs.js";
import { Entry, EntryMeta, SharedContextStore, WriteResult } from "./store.js";

export const CONTEXT_ACTIONS = ["list_keys", "read", "write", "delete"] as const;

export const ContextRequest = z.discriminatedUnion("action", [
  z.object({ action: z.literal("list_keys") }),
  z.object({ action: z.literal("read"), key: z.string().default("") }),
  z.object({ action: z.literal("write"), key: z.string().default(""), value: z.string().default("") }),
  z.object({ action: z.literal("delete"), key: z.string().default("") }),
]);

export type ContextResponse =
  | { keys: EntryMeta[]; totalSizeTokens: number }
  | Entry
  | WriteResult
  | { deleted: string; previousVersion: number }
  | ErrorResponse;

export const CONTEXT_TOOL: ToolSpec = {
  name: "shared_context",
  description:
    "Read and write to the shared context store, the session's working memory. " +
    "Use list_keys to see available keys (always call this first). " +
    "Use read to get a key's value. " +
    "Use write to create or update a key. " +
    "Use delete to remove a key that is no longer relevant.",
  parameters: {
    type: "object",
    properties: {
      action: {
        type: "string",
        enum: [...CONTEXT_ACTIONS],
        description:
          "The operation to perform. list_keys: returns all keys with metadata (no values). read: returns the value for a single key. " +
          "write: creates or overwrites a key. delete: removes a key entirely.",
      },
      key: {
        type: "string",
        description:
          "The key to operate on. Required for read, write, and delete. Must be lowercase alphanumeric + underscores, max 64 characters.",
      },
      value: {
        type: "string",
        description: "The value to write. Required for write. Must be distilled state, not raw data. Max ~1000 tokens.",
      },
    },
    required: ["action"],
  },
};

/**
 * Protocol surface of the store. `participant` is set by the execution layer;
 * a request cannot name its own author.
 */
export function handleContextRequest(
  store: SharedContextStore,
  request: unknown,
  opts: { participant?: string } = {}
): ContextResponse {
  const action = typeof request === "object" && request !== null && "action" in request ? request.action : undefined;
  if (!CONTEXT_ACTIONS.some((a) => a === action)) return invalidAction(action, CONTEXT_ACTIONS);

  const parsed = ContextRequest.safeParse(request);
  if (!parsed.success) {
    return new InvalidRequestError(`Invalid ${String(action)} request`, formatIssues(parsed.error.issues)).toResponse();
  }
  const req = parsed.data;
  try {
    switch (req.action) {
      case "list_keys":
        return store.listKeys();
      case "read":
        return store.read(req.key);
      case "write":
        return store.write(req.key, req.value, opts.participant ?? "unknown");
      case "delete":
        return store.delete(req.key);
    }
  } catch (e: unknown) {
    if (e instanceof ProtocolError) return e.toResponse();
    throw e;
  }
}
