import { stat } from "fs/promises";
import { glob } from "glob";
import { extname, resolve } from "path";

const SCHEMA_EXTENSIONS = new Set([".json", ".yaml", ".yml"]);

function isSchemaFile(path: string): boolean {
    return SCHEMA_EXTENSIONS.has(extname(path));
}

/**
 * Expands a list of file paths, directories, or glob patterns into a list of schema documents.
 * Directories are converted to globs that match all nested .json/.yaml/.yml files.
 */
export async function expandFilePaths(paths: string[]): Promise<string[]> {
    const allFiles = new Set<string>();

    for (const path of paths) {
        const resolvedPath = resolve(path);
        const stats = await stat(resolvedPath).catch(() => undefined);

        if (stats?.isDirectory()) {
            const files = await glob(`${resolvedPath}/**/*.{json,yaml,yml}`, { nodir: true, absolute: true });
            files.forEach((f) => allFiles.add(f));
        } else if (stats?.isFile()) {
            if (isSchemaFile(resolvedPath)) {
                allFiles.add(resolvedPath);
            }
        } else {
            // Not on disk: treat as a glob pattern
            const files = await glob(path, { nodir: true, absolute: true });
            files.filter(isSchemaFile).forEach((f) => allFiles.add(f));
        }
    }

    return Array.from(allFiles).sort();
}

/**
 * Verbose tracing for `--debug`
 */
export class DebugLogger {
    constructor(
        private readonly enabled: boolean,
        private readonly sink: (...args: unknown[]) => void = console.log,
    ) {}

    group(title: string): void {
        if (this.enabled) this.sink(`\n=== ${title} ===`);
    }

    log(...args: unknown[]): void {
        if (this.enabled) this.sink("[debug]", ...args);
    }
}
