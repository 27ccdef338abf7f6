/**
 * YANG to proto compiler
 *
 * Builds the compiled tree of each module. Compilation never touches the
 * filesystem; a ResolutionError aborts before anything is written.
 */
import type { CompiledModule } from "../ir/types";
import { createMessage, sanitizeIdentifier, toPascalCase } from "../ir/utils";
import { type Logger, silentLogger } from "../logger";
import type { ModuleSet, Statement } from "../schema/types";
import type { BuildContext } from "./context";
import { buildChildren } from "./tree-builder";

export type { BuildContext } from "./context";
export { compileEnumeration, type EnumCompileResult, type EnumDeclaration } from "./enum-compiler";
export { extractRpc } from "./rpc-extractor";
export { buildChildren } from "./tree-builder";
export { resolveLeafType, type ResolvedType } from "./type-resolver";

export interface CompileOptions {
    log?: Logger;
}

/**
 * Compile one module statement
 */
export function compileModule(module: Statement, modules: ModuleSet, options: CompileOptions = {}): CompiledModule {
    const ctx: BuildContext = {
        modules,
        module,
        root: createMessage("container", module.arg),
        rpcs: [],
        limitations: [],
        log: options.log ?? silentLogger,
        enumScopes: new Map(),
        usesStructValue: false,
    };

    buildChildren(module, ctx.root, ctx);

    return {
        name: module.arg,
        plainName: sanitizeIdentifier(module.arg),
        pascalName: toPascalCase(module.arg),
        containers: ctx.root.containers,
        lists: ctx.root.lists,
        leafs: ctx.root.leafs,
        rpcs: ctx.rpcs,
        usesStructValue: ctx.usesStructValue,
        limitations: ctx.limitations,
    };
}

/**
 * Compile every module of the set in load order. Submodules are skipped: their
 * content is reached through the modules that include them.
 */
export function compileModules(modules: ModuleSet, options: CompileOptions = {}): CompiledModule[] {
    const compiled: CompiledModule[] = [];
    for (const module of modules.values()) {
        if (module.keyword === "submodule") continue;
        options.log?.info(`===> processing ${module.arg} ...`);
        compiled.push(compileModule(module, modules, options));
    }
    return compiled;
}
