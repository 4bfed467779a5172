import { tool } from "@langchain/core/tools";
import { z } from "zod";
import type { MediaCacheEngine } from "@media-cache/core";
import { formatError, toJsonText } from "./utils/format.js";

export interface RebuildToolParams {
    engine: MediaCacheEngine;
}

/**
 * Create a tool that rescans the media directories and re-registers what it finds
 */
export function createRebuildTool({ engine }: RebuildToolParams) {
    return tool(
        async () => {
            try {
                return toJsonText(await engine.rebuild());
            } catch (error) {
                return formatError(error);
            }
        },
        {
            name: "cache_rebuild",
            description: `Scans the source, generated and metadata directories and registers every file that can be identified. Generated files are identified by their provenance sidecar. Safe to run repeatedly; a second run changes nothing.

Returns JSON: { "registered", "unchanged", "orphaned", "conflicts", "missingDirectories" }. Orphans are files that could not be identified; they are reported, never deleted.`,
            schema: z.object({}),
        }
    );
}
