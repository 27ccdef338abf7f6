import { parseArgs } from "util";

import { isFatalCompileError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { compileSchemas } from "./compile";

export const HELP_TEXT = `
yang2proto - compile YANG RPC modules to proto3 and TypeScript stubs

Usage:
  yang2proto <command> [options]

Commands:
  compile [files...]     Compile statement documents (.json, .yaml, .yml)
  help                   Show this text

Compile Options:
  --proto-outdir <dir>         Output directory for .proto files (required)
  --server-rpc-outdir <dir>    Output directory for server stubs (required)
  --client-rpc-outdir <dir>    Output directory for the client program (required)
  --package-prefix <name>      First component of the proto package (default: gnoi)
  --quiet                      Only print warnings and errors
  --debug                      Trace every step

Examples:
  # Compile every document below a directory
  yang2proto compile build/yang/ --proto-outdir build/proto \\
      --server-rpc-outdir build/server --client-rpc-outdir build/client

Exit codes:
  0  success
  1  unexpected failure (malformed document, I/O error, bad usage)
  2  missing output directory or unresolved type, typedef, prefix or leafref
`;

/** Exit code for configuration and resolution errors */
export const EXIT_RESOLUTION = 2;

/**
 * Run the command line and return the process exit code. Without a `logger`,
 * output goes to the console.
 */
export async function runCli(rawArgs: string[], logger?: Logger): Promise<number> {
    const log = logger ?? createLogger();

    if (rawArgs.length === 0 || rawArgs[0] === "--help" || rawArgs[0] === "-h" || rawArgs[0] === "help") {
        log.info(HELP_TEXT);
        return 0;
    }

    const command = rawArgs[0];
    if (command !== "compile") {
        log.error(`Error: Unknown command "${command}"`);
        log.info(HELP_TEXT);
        return 1;
    }

    try {
        const { values, positionals } = parseArgs({
            args: rawArgs.slice(1),
            options: {
                "proto-outdir": { type: "string" },
                "server-rpc-outdir": { type: "string" },
                "client-rpc-outdir": { type: "string" },
                "package-prefix": { type: "string" },
                quiet: { type: "boolean", default: false },
                debug: { type: "boolean", default: false },
            },
            allowPositionals: true,
        });

        let output = logger ?? createLogger({ quiet: values.quiet });
        if (logger && values.quiet) output = { ...logger, info: () => {} };

        await compileSchemas(positionals, {
            protoOutdir: values["proto-outdir"],
            serverOutdir: values["server-rpc-outdir"],
            clientOutdir: values["client-rpc-outdir"],
            packagePrefix: values["package-prefix"],
            debug: values.debug,
            log: output,
        });
        return 0;
    } catch (error) {
        log.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        return isFatalCompileError(error) ? EXIT_RESOLUTION : 1;
    }
}
