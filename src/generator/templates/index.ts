/**
 * Stub templates
 *
 * Each template takes the compiled modules of a run and returns a mapping of
 * file names to contents, relative to the directory the file belongs in.
 *
 * @example
 * ```typescript
 * import { registerTemplate } from "./generator/templates";
 *
 * const files = registerTemplate({ modules, prefix: "sonic", packagePrefix: "gnoi" });
 * console.log(files["sonic_register.ts"]);
 * ```
 */

export type { GeneratorOutput, StubTemplate, StubTemplateContext } from "./types";

export { default as serverTemplate, templateServerHandlers } from "./server";
export { default as registerTemplate, registerFileName, templateRegister } from "./register";
export { default as hostTemplate, templateHost } from "./host";
export { default as clientTemplate, clientFilePath, templateClient } from "./client";
export { dedent } from "./dedent";
export { modulesWithRpcs, serverHandlerPath, stubPrefix } from "./helpers";
