import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "../logger";

describe("createLogger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("should print info to stdout and warnings to stderr", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

        const logger = createLogger();
        logger.info("writing file: a.proto");
        logger.warn("m: 1 enumeration(s) emitted as string");

        expect(log.mock.calls).toEqual([["writing file: a.proto"]]);
        expect(warn.mock.calls).toEqual([["m: 1 enumeration(s) emitted as string"]]);
    });

    it("should drop info but keep errors when quiet", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        const error = vi.spyOn(console, "error").mockImplementation(() => {});

        const logger = createLogger({ quiet: true });
        logger.info("writing file: a.proto");
        logger.error("Error: boom");

        expect(log).not.toHaveBeenCalled();
        expect(error.mock.calls).toEqual([["Error: boom"]]);
    });
});
