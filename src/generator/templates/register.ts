/**
 * Service registration template
 *
 * Binds the handlers of every compiled module to their proto service.
 */
import { VariableDeclarationKind } from "ts-morph";

import { protoFilePath, protoServiceName } from "../../ir/generators/ir-to-proto";
import type { CompiledModule } from "../../ir/types";
import { createSourceFile, generatedHeader, HOST_MODULE, modulesWithRpcs, printSourceFile } from "./helpers";
import type { GeneratorOutput, StubTemplateContext } from "./types";

export function registerFileName(prefix: string): string {
    return `${prefix}_register.ts`;
}

function bindingLiteral(module: CompiledModule, packagePrefix: string): string {
    const handlers = module.rpcs.map((rpc) => `${rpc.methodName}: ${module.pascalName}.${rpc.methodName}`).join(", ");
    return [
        "{",
        `service: ${JSON.stringify(protoServiceName(module, packagePrefix))},`,
        `protoPath: ${JSON.stringify(protoFilePath(module))},`,
        `handlers: { ${handlers} },`,
        "}",
    ].join("\n");
}

export function templateRegister(ctx: StubTemplateContext): string {
    const modules = modulesWithRpcs(ctx.modules);
    const sourceFile = createSourceFile(registerFileName(ctx.prefix));

    sourceFile.addImportDeclaration({
        isTypeOnly: true,
        moduleSpecifier: `./${HOST_MODULE}`,
        namedImports: ["ServiceBinding"],
    });
    for (const module of modules) {
        sourceFile.addImportDeclaration({
            moduleSpecifier: `./${module.plainName}/${module.plainName}`,
            namespaceImport: module.pascalName,
        });
    }

    const bindings = modules.map((module) => bindingLiteral(module, ctx.packagePrefix) + ",");
    sourceFile.addVariableStatement({
        isExported: true,
        declarationKind: VariableDeclarationKind.Const,
        declarations: [
            {
                name: "services",
                type: "ServiceBinding[]",
                initializer: bindings.length === 0 ? "[]" : ["[", ...bindings, "]"].join("\n"),
            },
        ],
    });

    return printSourceFile(sourceFile, generatedHeader(`for modules: ${modules.map((m) => m.name).join(", ") || "none"}`));
}

export default function registerTemplate(ctx: StubTemplateContext): GeneratorOutput {
    return { [registerFileName(ctx.prefix)]: templateRegister(ctx) };
}
