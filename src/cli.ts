import { errorMessage } from "@media-cache/core";
import { createProgram } from "./program.js";

try {
    await createProgram().parseAsync(process.argv);
} catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
}
