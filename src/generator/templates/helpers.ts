/**
 * Helper functions shared by the stub templates
 */
import { Project, type SourceFile } from "ts-morph";

import type { CompiledModule } from "../../ir/types";

export const HOST_MODULE = "host";

/**
 * Modules that produce a service; the others have nothing to register or call
 */
export function modulesWithRpcs(modules: readonly CompiledModule[]): CompiledModule[] {
    return modules.filter((module) => module.rpcs.length > 0);
}

/**
 * Name prefix of the aggregate files: "sonic" as soon as one SONiC module
 * provides a service, "openconfig" otherwise. Modules without rpcs do not count.
 */
export function stubPrefix(modules: readonly CompiledModule[]): string {
    return modulesWithRpcs(modules).some((module) => module.name.toLowerCase().startsWith("sonic")) ? "sonic" : "openconfig";
}

/**
 * Path of a module's server handler file, relative to the server output directory
 */
export function serverHandlerPath(module: CompiledModule): string {
    return `${module.plainName}/${module.plainName}.ts`;
}

export function generatedHeader(what: string): string {
    return `// Generated by yang2proto ${what}.\n`;
}

/**
 * Create a source file in a throwaway in-memory project
 */
export function createSourceFile(fileName: string): SourceFile {
    const project = new Project({ useInMemoryFileSystem: true });
    return project.createSourceFile(fileName, "", { overwrite: true });
}

/**
 * Format a generated source file and prepend the header
 */
export function printSourceFile(sourceFile: SourceFile, header: string): string {
    sourceFile.formatText({ indentSize: 4, tabSize: 4, convertTabsToSpaces: true });
    return header + "\n" + sourceFile.getFullText();
}
