/**
 * Server handler template
 *
 * One file per module, one exported handler per RPC. Handlers forward the
 * request to the host under the RPC's route.
 */
import type { OptionalKind, ParameterDeclarationStructure } from "ts-morph";

import type { CompiledModule, Rpc } from "../../ir/types";
import { createSourceFile, generatedHeader, HOST_MODULE, modulesWithRpcs, printSourceFile, serverHandlerPath } from "./helpers";
import type { GeneratorOutput, StubTemplateContext } from "./types";

function handlerParameters(rpc: Rpc): OptionalKind<ParameterDeclarationStructure>[] {
    const host = { name: "host", type: "RpcHost" };
    return rpc.inputEmpty ? [host] : [host, { name: "request", type: "RpcPayload" }];
}

function handlerStatements(rpc: Rpc): string[] {
    const args = rpc.inputEmpty ? JSON.stringify(rpc.route) : `${JSON.stringify(rpc.route)}, request`;
    if (rpc.outputEmpty) {
        return [`await host.invoke(${args});`, "return {};"];
    }
    return [`return host.invoke(${args});`];
}

/**
 * Generate the handler file of one module
 */
export function templateServerHandlers(module: CompiledModule): string {
    const sourceFile = createSourceFile(serverHandlerPath(module));

    sourceFile.addImportDeclaration({
        isTypeOnly: true,
        moduleSpecifier: `../${HOST_MODULE}`,
        namedImports: ["RpcHost", "RpcPayload"],
    });

    for (const rpc of module.rpcs) {
        sourceFile.addFunction({
            docs: [`Handles ${rpc.route}`],
            isExported: true,
            isAsync: true,
            name: rpc.methodName,
            parameters: handlerParameters(rpc),
            returnType: "Promise<RpcPayload>",
            statements: handlerStatements(rpc),
        });
    }

    return printSourceFile(sourceFile, generatedHeader(`from YANG module ${module.name}`));
}

export default function serverTemplate(ctx: StubTemplateContext): GeneratorOutput {
    const output: GeneratorOutput = {};
    for (const module of modulesWithRpcs(ctx.modules)) {
        output[serverHandlerPath(module)] = templateServerHandlers(module);
    }
    return output;
}
