import { tool } from "@langchain/core/tools";
import { z } from "zod";
import type { MediaCacheEngine } from "@media-cache/core";
import { formatError, toJsonText } from "./utils/format.js";

export interface InvalidateToolParams {
    engine: MediaCacheEngine;
}

/**
 * Create a tool that re-checks a source file and invalidates what was derived from it
 */
export function createInvalidateTool({ engine }: InvalidateToolParams) {
    return tool(
        async ({ source_path }) => {
            try {
                const divergence = await engine.invalidateSinceChange(source_path);
                return toJsonText(divergence ?? { changed: false, staleIds: [] });
            } catch (error) {
                return formatError(error);
            }
        },
        {
            name: "cache_invalidate_since_change",
            description: `Compares a registered source file with its recorded size and modification time. If it changed or disappeared, every artifact derived from it (directly or transitively) is marked stale and will be regenerated on the next lookup.

Returns JSON: the divergence { "sourceId", "kind": "modified" | "missing", "recorded", "current", "staleIds" }, or { "changed": false, "staleIds": [] } when nothing changed.`,
            schema: z.object({
                source_path: z.string().min(1).describe("Path of the registered source file."),
            }),
        }
    );
}
