import { resolve } from "path";

import { ConfigurationError } from "../errors";
import { DEFAULT_PACKAGE_PREFIX } from "../ir/generators/ir-to-proto";

/**
 * Options as given on the command line or by a library caller
 */
export interface CompilerOptions {
    protoOutdir?: string;
    serverOutdir?: string;
    clientOutdir?: string;
    packagePrefix?: string;
}

export interface CompilerConfig {
    protoOutdir: string;
    serverOutdir: string;
    clientOutdir: string;
    packagePrefix: string;
}

const DIRECTORY_FLAGS = {
    protoOutdir: "--proto-outdir",
    serverOutdir: "--server-rpc-outdir",
    clientOutdir: "--client-rpc-outdir",
} as const;

function requireDirectory(options: CompilerOptions, key: keyof typeof DIRECTORY_FLAGS): string {
    const value = options[key];
    if (!value) {
        throw new ConfigurationError(DIRECTORY_FLAGS[key], `${DIRECTORY_FLAGS[key]} cannot be empty`);
    }
    return resolve(value);
}

/**
 * Validate options and resolve output directories to absolute paths
 */
export function resolveConfig(options: CompilerOptions): CompilerConfig {
    const packagePrefix = options.packagePrefix ?? DEFAULT_PACKAGE_PREFIX;
    if (!/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/.test(packagePrefix)) {
        throw new ConfigurationError("--package-prefix", `--package-prefix "${packagePrefix}" is not a proto package name`);
    }

    return {
        protoOutdir: requireDirectory(options, "protoOutdir"),
        serverOutdir: requireDirectory(options, "serverOutdir"),
        clientOutdir: requireDirectory(options, "clientOutdir"),
        packagePrefix,
    };
}
