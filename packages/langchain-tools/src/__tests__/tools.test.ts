import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { pino } from "pino";
import { MediaCacheEngine, derivedId } from "@media-cache/core";
import {
    createCommitTool,
    createIntegrityReportTool,
    createInvalidateTool,
    createLookupOrPlanTool,
    createMediaCacheTools,
    createRebuildTool,
    createResolveTool,
} from "../index.js";

const silent = pino({ level: "silent" });

function parse(text: unknown): unknown {
    return JSON.parse(String(text));
}

describe("media-cache tools", () => {
    let testRoot: string;
    let engine: MediaCacheEngine;
    let clipPath: string;

    beforeEach(async () => {
        testRoot = await fs.mkdtemp(path.join(os.tmpdir(), "media-cache-tools-test-"));
        const sourceDir = path.join(testRoot, "source");
        await fs.mkdir(sourceDir, { recursive: true });
        clipPath = path.join(sourceDir, "clip.mp4");
        await fs.writeFile(clipPath, "frames");
        engine = await MediaCacheEngine.open({
            registryPath: path.join(testRoot, "metadata", "registry.json"),
            sourceDir,
            generatedDir: path.join(testRoot, "generated"),
            metadataDir: path.join(testRoot, "metadata"),
            logger: silent,
        });
        await engine.registerSource(clipPath);
    });

    afterEach(async () => {
        await fs.rm(testRoot, { recursive: true, force: true });
    });

    it("should expose the six tools by name", () => {
        expect(createMediaCacheTools(engine).map((t) => t.name)).toEqual([
            "cache_lookup_or_plan",
            "cache_commit",
            "cache_resolve",
            "cache_invalidate_since_change",
            "cache_rebuild",
            "cache_integrity_report",
        ]);
    });

    it("should plan, commit and then report a hit", async () => {
        const lookup = createLookupOrPlanTool({ engine });
        const commit = createCommitTool({ engine });
        const outputPath = path.join(testRoot, "generated", "trim_dec023af91e597e5.mp4");

        const miss = parse(await lookup.invoke({ inputs: ["src_clip_mp4"], operation: "trim", parameters: { start: 0, duration: 5 } }));
        expect(miss).toEqual({ status: "miss", id: "trim_dec023af91e597e5", outputPath, reason: "absent" });

        await fs.mkdir(path.dirname(outputPath), { recursive: true });
        await fs.writeFile(outputPath, "trimmed");
        expect(parse(await commit.invoke({ id: "trim_dec023af91e597e5" }))).toEqual({
            id: "trim_dec023af91e597e5",
            path: outputPath,
        });

        const hit = parse(await lookup.invoke({ inputs: ["src_clip_mp4"], operation: "trim", parameters: { duration: 5, start: 0 } }));
        expect(hit).toEqual({ status: "hit", id: "trim_dec023af91e597e5", path: outputPath });
    });

    it("should plan an operation without file inputs", async () => {
        const lookup = createLookupOrPlanTool({ engine });
        const id = derivedId([], "tone", { hz: 440 });

        expect(parse(await lookup.invoke({ inputs: [], operation: "tone", parameters: { hz: 440 } }))).toEqual({
            status: "miss",
            id,
            outputPath: path.join(testRoot, "generated", `${id}.bin`),
            reason: "absent",
        });
    });

    it("should return errors as text", async () => {
        const lookup = createLookupOrPlanTool({ engine });
        const resolve = createResolveTool({ engine });

        expect(await resolve.invoke({ id: "nope" })).toBe("Error: Resource not found: nope");
        expect(await lookup.invoke({ inputs: ["src_ghost_wav"], operation: "trim" })).toBe(
            "Error: Input resource not found: src_ghost_wav"
        );
    });

    it("should resolve sources with their kind", async () => {
        const resolve = createResolveTool({ engine });
        expect(parse(await resolve.invoke({ id: "src_clip_mp4" }))).toEqual({
            id: "src_clip_mp4",
            path: clipPath,
            kind: "source",
            stale: false,
        });
    });

    it("should report invalidations", async () => {
        const invalidate = createInvalidateTool({ engine });
        expect(parse(await invalidate.invoke({ source_path: clipPath }))).toEqual({ changed: false, staleIds: [] });

        await fs.writeFile(clipPath, "re-shot frames");
        expect(parse(await invalidate.invoke({ source_path: clipPath }))).toMatchObject({
            sourceId: "src_clip_mp4",
            kind: "modified",
            staleIds: [],
        });
    });

    it("should report rebuild and integrity results", async () => {
        const rebuild = createRebuildTool({ engine });
        const integrity = createIntegrityReportTool({ engine });

        expect(parse(await rebuild.invoke({}))).toMatchObject({
            registered: { source: [], generated: [], metadata: [] },
            unchanged: { source: ["src_clip_mp4"], generated: [], metadata: [] },
            orphaned: [],
            conflicts: [],
        });

        await fs.rm(clipPath);
        expect(parse(await integrity.invoke({}))).toEqual({ source: ["src_clip_mp4"], generated: [], metadata: [] });
    });
});
