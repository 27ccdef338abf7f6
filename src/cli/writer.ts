import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";

import type { Logger } from "../logger";

async function readIfExists(path: string): Promise<string | undefined> {
    try {
        return await readFile(path, "utf-8");
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
        throw error;
    }
}

/**
 * Writes files only when their content changed.
 *
 * Writes are sequential; callers await each one.
 */
export class ChangeAwareWriter {
    readonly written: string[] = [];
    readonly unchanged: string[] = [];

    constructor(private readonly log: Logger) {}

    /**
     * Write `content` to `path` unless the file already holds exactly that.
     * Returns whether the file was written.
     */
    async write(path: string, content: string): Promise<boolean> {
        const existing = await readIfExists(path);
        if (existing === content) {
            this.log.info(`file ${path} unchanged, skipped writing...`);
            this.unchanged.push(path);
            return false;
        }

        await mkdir(dirname(path), { recursive: true });
        this.log.info(`writing file: ${path}`);
        await writeFile(path, content, "utf-8");
        this.written.push(path);
        return true;
    }
}
