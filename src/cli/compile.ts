import { mkdir } from "fs/promises";
import { resolve } from "path";

import { compileModules } from "../compiler";
import { irToProtobuf, protoFilePath } from "../ir/generators/ir-to-proto";
import type { CompiledModule } from "../ir/types";
import { createLogger, type Logger } from "../logger";
import { hydrateModules, loadSchemaFiles } from "../schema/loader";
import {
    clientTemplate,
    hostTemplate,
    registerTemplate,
    serverHandlerPath,
    stubPrefix,
    templateServerHandlers,
    type GeneratorOutput,
    type StubTemplateContext,
} from "../generator/templates";
import { type CompilerConfig, type CompilerOptions, resolveConfig } from "./config";
import { DebugLogger, expandFilePaths } from "./utils";
import { ChangeAwareWriter } from "./writer";

export interface CompileSchemasOptions extends CompilerOptions {
    debug?: boolean;
    log?: Logger;
}

export interface CompileReport {
    /** Compiled module names, in processing order */
    modules: string[];
    written: string[];
    unchanged: string[];
}

async function writeOutput(writer: ChangeAwareWriter, dir: string, output: GeneratorOutput): Promise<void> {
    for (const [file, content] of Object.entries(output)) {
        await writer.write(resolve(dir, file), content);
    }
}

/**
 * Write the generated files of a run.
 *
 * A module's server handler file is regenerated only when its proto file
 * changed. The host, registration and client files cover all modules and are
 * written last.
 */
export async function writeArtifacts(
    compiled: readonly CompiledModule[],
    config: CompilerConfig,
    writer: ChangeAwareWriter,
    log: Logger,
): Promise<void> {
    for (const module of compiled) {
        const proto = irToProtobuf(module, { packagePrefix: config.packagePrefix });
        const protoChanged = await writer.write(resolve(config.protoOutdir, protoFilePath(module)), proto);
        if (module.rpcs.length === 0) continue;

        if (protoChanged) {
            await writer.write(resolve(config.serverOutdir, serverHandlerPath(module)), templateServerHandlers(module));
        } else {
            log.info(`skip unchanged module: ${module.name}`);
        }
    }

    const ctx: StubTemplateContext = {
        modules: compiled,
        prefix: stubPrefix(compiled),
        packagePrefix: config.packagePrefix,
    };
    await writeOutput(writer, config.serverOutdir, hostTemplate());
    await writeOutput(writer, config.serverOutdir, registerTemplate(ctx));
    await writeOutput(writer, config.clientOutdir, clientTemplate(ctx));
}

/**
 * Compile YANG statement documents into proto files and stubs.
 */
export async function compileSchemas(paths: string[], options: CompileSchemasOptions = {}): Promise<CompileReport> {
    const log = options.log ?? createLogger();
    const debug = new DebugLogger(options.debug ?? false);

    const config = resolveConfig(options);

    debug.group("Command Arguments");
    debug.log("Input paths:", paths);
    debug.log("Proto output directory:", config.protoOutdir);
    debug.log("Server stub output directory:", config.serverOutdir);
    debug.log("Client output directory:", config.clientOutdir);
    debug.log("Package prefix:", config.packagePrefix);

    for (const dir of [config.protoOutdir, config.serverOutdir, config.clientOutdir]) {
        await mkdir(dir, { recursive: true });
    }

    const files = await expandFilePaths(paths);
    debug.group("Found Files");
    debug.log(`Total files found: ${files.length}`);
    if (files.length === 0) {
        throw new Error("No schema documents found");
    }
    debug.log("Files:", files);

    const modules = hydrateModules(await loadSchemaFiles(files));
    debug.group("Loaded Modules");
    debug.log("Modules:", [...modules.keys()]);

    const compiled = compileModules(modules, { log });
    for (const module of compiled) {
        debug.log(`${module.name}: ${module.rpcs.length} rpc(s), ${module.limitations.length} limitation(s)`);
        if (module.limitations.length > 0) {
            log.warn(`${module.name}: ${module.limitations.length} enumeration(s) emitted as string`);
        }
    }

    const writer = new ChangeAwareWriter(log);
    await writeArtifacts(compiled, config, writer, log);

    debug.group("Written Files");
    debug.log("Written:", writer.written);
    debug.log("Unchanged:", writer.unchanged);

    return {
        modules: compiled.map((module) => module.name),
        written: writer.written,
        unchanged: writer.unchanged,
    };
}
