import { tool } from "@langchain/core/tools";
import { z } from "zod";
import type { MediaCacheEngine } from "@media-cache/core";
import { formatError, toJsonText } from "./utils/format.js";

export interface IntegrityReportToolParams {
    engine: MediaCacheEngine;
}

export function createIntegrityReportTool({ engine }: IntegrityReportToolParams) {
    return tool(
        async () => {
            try {
                return toJsonText(await engine.integrityReport());
            } catch (error) {
                return formatError(error);
            }
        },
        {
            name: "cache_integrity_report",
            description: `Lists registered IDs whose backing file no longer exists, grouped by category. Nothing is removed.

Returns JSON: { "source": [...], "generated": [...], "metadata": [...] }.`,
            schema: z.object({}),
        }
    );
}
