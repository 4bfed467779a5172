import { tool } from "@langchain/core/tools";
import { z } from "zod";
import type { MediaCacheEngine } from "@media-cache/core";
import { formatError, toJsonText } from "./utils/format.js";

export interface ResolveToolParams {
    engine: MediaCacheEngine;
}

export function createResolveTool({ engine }: ResolveToolParams) {
    return tool(
        async ({ id }) => {
            try {
                const entry = engine.registry.get(id);
                return toJsonText({
                    id,
                    path: engine.resolve(id),
                    kind: entry?.kind,
                    stale: engine.registry.isStale(id),
                });
            } catch (error) {
                return formatError(error);
            }
        },
        {
            name: "cache_resolve",
            description: `Returns the file path of any registered resource (source, generated or metadata), with its kind and whether it is stale.

Returns JSON: { "id": "...", "path": "...", "kind": "...", "stale": false }.`,
            schema: z.object({
                id: z.string().min(1).describe("Resource ID, e.g. src_clip_mp4 or trim_dec023af91e597e5."),
            }),
        }
    );
}
