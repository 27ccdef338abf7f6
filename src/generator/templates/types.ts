/**
 * Common types for stub templates
 */
import type { CompiledModule } from "../../ir/types";

/**
 * Common output format for all templates
 * Maps file names, relative to the template's output directory, to contents
 */
export interface GeneratorOutput {
    [filename: string]: string;
}

/**
 * Context of the aggregate templates: every module compiled in this run
 */
export interface StubTemplateContext {
    modules: readonly CompiledModule[];
    /** "sonic" or "openconfig", names the registration file and client directory */
    prefix: string;
    packagePrefix: string;
}

/**
 * Template function signature
 */
export type StubTemplate = (ctx: StubTemplateContext) => GeneratorOutput;
