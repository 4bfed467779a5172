import { tool } from "@langchain/core/tools";
import { z } from "zod";
import type { MediaCacheEngine } from "@media-cache/core";
import { formatError, toJsonText } from "./utils/format.js";

export interface CommitToolParams {
    engine: MediaCacheEngine;
}

/**
 * Create a tool that registers the file produced for a planned miss
 */
export function createCommitTool({ engine }: CommitToolParams) {
    return tool(
        async ({ id, path }) => {
            try {
                return toJsonText(await engine.commit(id, path));
            } catch (error) {
                return formatError(error);
            }
        },
        {
            name: "cache_commit",
            description: `Registers the artifact produced after a cache_lookup_or_plan miss. The file must exist and be non-empty.

Returns JSON: { "id": "...", "path": "..." }.

Usage examples:
- File written to the planned outputPath: { id: "trim_dec023af91e597e5" }
- File written elsewhere: { id: "trim_dec023af91e597e5", path: "/tmp/render.mp4" }`,
            schema: z.object({
                id: z.string().min(1).describe("The id returned by the miss."),
                path: z
                    .string()
                    .optional()
                    .describe("Where the artifact was written. Defaults to the planned outputPath."),
            }),
        }
    );
}
