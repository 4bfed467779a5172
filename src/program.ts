import { Command, InvalidArgumentError } from "commander";
import { destination } from "pino";
import {
    MediaCacheEngine,
    createEncoderTransform,
    createRootLogger,
    loadConfig,
    type LogDestination,
    type MediaCacheConfig,
} from "@media-cache/core";

export interface ProgramOptions {
    env?: Record<string, string | undefined>;
    /** Receives each command's JSON result */
    write?: (text: string) => void;
    /** Where logs go; stderr by default so stdout stays parseable */
    logDestination?: LogDestination;
}

type GlobalOptions = {
    root?: string;
    registry?: string;
};

function parseMilliseconds(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError("Expected a non-negative integer.");
    }
    return parsed;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

function collectParam(value: string, previous: Record<string, string | number>): Record<string, string | number> {
    const separator = value.indexOf("=");
    if (separator <= 0) {
        throw new InvalidArgumentError("Expected key=value.");
    }
    const raw = value.slice(separator + 1);
    const numeric = Number(raw);
    return {
        ...previous,
        [value.slice(0, separator)]: raw.trim() !== "" && Number.isFinite(numeric) ? numeric : raw,
    };
}

/**
 * media-cache command line: maintenance commands over the registry
 */
export function createProgram({
    env = process.env,
    write = (text) => console.log(text),
    logDestination = destination(2),
}: ProgramOptions = {}): Command {
    const program = new Command();

    program
        .name("media-cache")
        .description("Inspect and repair the media artifact registry")
        .option("-r, --root <dir>", "media root (overrides MEDIA_CACHE_ROOT)")
        .option("--registry <path>", "registry document (overrides MEDIA_CACHE_REGISTRY_PATH)");

    const output = (value: unknown) => write(JSON.stringify(value, null, 2));

    async function withEngine<T>(run: (engine: MediaCacheEngine, config: MediaCacheConfig) => Promise<T>): Promise<T> {
        const globals = program.opts<GlobalOptions>();
        const overrides: Partial<MediaCacheConfig> = {};
        if (globals.root) overrides.rootDir = globals.root;
        if (globals.registry) overrides.registryPath = globals.registry;
        const config = loadConfig(env, overrides);

        const engine = await MediaCacheEngine.open({
            registryPath: config.registryPath,
            sourceDir: config.sourceDir,
            generatedDir: config.generatedDir,
            metadataDir: config.metadataDir,
            logger: createRootLogger(config.logLevel, logDestination),
        });
        try {
            return await run(engine, config);
        } finally {
            await engine.close();
        }
    }

    program
        .command("rebuild")
        .description("Scan the media directories and register everything that can be identified")
        .action(async () => {
            output(await withEngine((engine) => engine.rebuild()));
        });

    program
        .command("integrity")
        .description("List registered IDs whose backing file is missing")
        .option("--strict", "exit with an error when anything is missing")
        .action(async (options: { strict?: boolean }) => {
            await withEngine(async (engine) => {
                const report = await engine.integrityReport();
                output(report);
                if (options.strict) {
                    await engine.recovery.assertIntegrity();
                }
            });
        });

    program
        .command("check-sources")
        .description("Detect changed source files and mark everything derived from them stale")
        .action(async () => {
            output(await withEngine((engine) => engine.checkSourceChanges()));
        });

    program
        .command("resolve")
        .description("Print the path of a registered resource")
        .argument("<id>", "resource ID")
        .action(async (id: string) => {
            output(await withEngine(async (engine) => ({ id, path: engine.resolve(id) })));
        });

    program
        .command("repair")
        .description("Drop entries whose inputs are no longer registered, with everything derived from them")
        .action(async () => {
            output({ removed: await withEngine((engine) => engine.repairDependencies()) });
        });

    program
        .command("run")
        .description("Run the configured encoder as a cached operation")
        .argument("<operation>", "operation name")
        .argument("<args...>", "encoder arguments after --; {input}, {input1} ... and {output} are filled in")
        .option("-i, --input <id>", "registered input ID, repeatable, in order", collect, [])
        .option("-p, --param <key=value>", "extra operation parameter, repeatable", collectParam, {})
        .requiredOption("--ext <extension>", "output file extension")
        .option("--metadata", "register the output as metadata")
        .action(
            async (
                operation: string,
                args: string[],
                options: { input: string[]; param: Record<string, string | number>; ext: string; metadata?: boolean }
            ) => {
                const result = await withEngine((engine, config) => {
                    const run = engine.createOperation({
                        operation,
                        extension: options.ext,
                        kind: options.metadata ? "metadata" : "generated",
                        transform: createEncoderTransform(config, args),
                    });
                    return run({ inputs: options.input, parameters: { ...options.param, args } });
                });
                output(result);
            }
        );

    program
        .command("cleanup")
        .description("Remove stale derived artifacts")
        .option("--older-than <ms>", "also remove artifacts created more than <ms> ago", parseMilliseconds)
        .option("--keep-files", "only drop registry entries, leave files on disk")
        .action(async (options: { olderThan?: number; keepFiles?: boolean }) => {
            const removed = await withEngine((engine) =>
                engine.cleanup({
                    ...(options.olderThan !== undefined ? { olderThanMs: options.olderThan } : {}),
                    deleteFiles: !options.keepFiles,
                })
            );
            output({ removed });
        });

    return program;
}
