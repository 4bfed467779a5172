import { tool } from "@langchain/core/tools";
import { z } from "zod";
import type { MediaCacheEngine } from "@media-cache/core";
import { formatError, toJsonText } from "./utils/format.js";

export interface LookupOrPlanToolParams {
    engine: MediaCacheEngine;
}

/**
 * Create a tool that answers "is this derivation already cached?"
 */
export function createLookupOrPlanTool({ engine }: LookupOrPlanToolParams) {
    return tool(
        async ({ inputs, operation, parameters = {}, extension, kind }) => {
            try {
                const outcome = await engine.lookupOrPlan(inputs, operation, parameters, {
                    ...(extension !== undefined ? { extension } : {}),
                    ...(kind !== undefined ? { kind } : {}),
                });
                return toJsonText(outcome);
            } catch (error) {
                return formatError(error);
            }
        },
        {
            name: "cache_lookup_or_plan",
            description: `Checks whether the artifact for an operation over registered inputs already exists.

Returns JSON:
- Hit: { "status": "hit", "id": "...", "path": "..." } - reuse the file at path.
- Miss: { "status": "miss", "id": "...", "outputPath": "...", "reason": "absent" | "stale" | "missing-file" } - produce the file at outputPath, then call cache_commit with the id.

The same inputs, operation and parameters always give the same id; parameter key order does not matter, input order does.

Usage examples:
- { inputs: ["src_clip_mp4"], operation: "trim", parameters: { start: 0, duration: 5 } }
- { inputs: ["src_clip_mp4"], operation: "probe", kind: "metadata" }
- { inputs: [], operation: "tone", parameters: { hz: 440 }, extension: "wav" }`,
            schema: z.object({
                inputs: z
                    .array(z.string().min(1))
                    .describe("Registered input IDs, in order (source IDs look like src_clip_mp4). Empty for generated-from-nothing outputs such as test tones."),
                operation: z
                    .string()
                    .describe("Operation name: lowercase letters, digits, '_' or '-', starting with a letter."),
                parameters: z
                    .record(z.string(), z.unknown())
                    .optional()
                    .describe("Operation parameters. Numbers are compared at 6 decimal places."),
                extension: z
                    .string()
                    .optional()
                    .describe("Output file extension without the dot. Defaults to the first input's extension."),
                kind: z
                    .enum(["generated", "metadata"])
                    .optional()
                    .describe("Use 'metadata' for JSON documents such as plans or probes. Default is 'generated'."),
            }),
        }
    );
}
