import type { MediaCacheEngine } from "@media-cache/core";
import { createCommitTool } from "./commitTool.js";
import { createIntegrityReportTool } from "./integrityReportTool.js";
import { createInvalidateTool } from "./invalidateTool.js";
import { createLookupOrPlanTool } from "./lookupOrPlanTool.js";
import { createRebuildTool } from "./rebuildTool.js";
import { createResolveTool } from "./resolveTool.js";

export { createLookupOrPlanTool, type LookupOrPlanToolParams } from "./lookupOrPlanTool.js";
export { createCommitTool, type CommitToolParams } from "./commitTool.js";
export { createResolveTool, type ResolveToolParams } from "./resolveTool.js";
export { createInvalidateTool, type InvalidateToolParams } from "./invalidateTool.js";
export { createRebuildTool, type RebuildToolParams } from "./rebuildTool.js";
export { createIntegrityReportTool, type IntegrityReportToolParams } from "./integrityReportTool.js";
export { toJsonText, formatError } from "./utils/format.js";

/**
 * Every media-cache tool bound to one engine, ready to hand to an agent
 */
export function createMediaCacheTools(engine: MediaCacheEngine) {
    return [
        createLookupOrPlanTool({ engine }),
        createCommitTool({ engine }),
        createResolveTool({ engine }),
        createInvalidateTool({ engine }),
        createRebuildTool({ engine }),
        createIntegrityReportTool({ engine }),
    ] as const;
}
