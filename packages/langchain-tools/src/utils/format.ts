import { errorMessage } from "@media-cache/core";

/**
 * Tool results are JSON text so the model can read structured fields
 */
export function toJsonText(value: unknown): string {
    return JSON.stringify(value, null, 2);
}

export function formatError(error: unknown): string {
    return `Error: ${errorMessage(error)}`;
}
