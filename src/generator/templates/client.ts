/**
 * Client dispatch template
 *
 * Generates one program covering the RPCs of every compiled module. The
 * program picks the method by its full name (`--rpc SonicRebootReboot`) and
 * sends `--jsonin` as the request input.
 */
import { protoFilePath, protoServiceName } from "../../ir/generators/ir-to-proto";
import { dedent } from "./dedent";
import { generatedHeader, modulesWithRpcs } from "./helpers";
import type { GeneratorOutput, StubTemplateContext } from "./types";

export function clientFilePath(prefix: string): string {
    return `${prefix}_client/main.ts`;
}

function dispatchCases(ctx: StubTemplateContext): string {
    return modulesWithRpcs(ctx.modules)
        .flatMap((module) =>
            module.rpcs.map((rpc) => {
                const request = rpc.inputEmpty ? "{}" : "input()";
                const target = [protoFilePath(module), protoServiceName(module, ctx.packagePrefix), rpc.methodName]
                    .map((part) => JSON.stringify(part))
                    .join(", ");
                return `case ${JSON.stringify(rpc.name)}:\n    return invoke(${target}, ${request});`;
            }),
        )
        .join("\n");
}

export function templateClient(ctx: StubTemplateContext): string {
    const cases = dispatchCases(ctx);
    return (
        "#!/usr/bin/env node\n" +
        generatedHeader("to call any generated RPC") +
        dedent`
            import * as grpc from "@grpc/grpc-js";
            import * as protoLoader from "@grpc/proto-loader";
            import { join } from "node:path";
            import { parseArgs } from "node:util";

            type Payload = Record<string, unknown>;

            const { values } = parseArgs({
                options: {
                    target: { type: "string", default: "localhost:8080" },
                    rpc: { type: "string" },
                    jsonin: { type: "string", default: "{}" },
                    "proto-dir": { type: "string", default: "proto" },
                },
            });

            function input(): Payload {
                return { input: JSON.parse(values.jsonin) };
            }

            function invoke(protoPath: string, service: string, method: string, request: Payload): Promise<Payload> {
                const protoDir = values["proto-dir"];
                const definition = protoLoader.loadSync(join(protoDir, protoPath), { keepCase: true, includeDirs: [protoDir] });
                const scope = service
                    .split(".")
                    .reduce((parent: grpc.GrpcObject, name) => parent[name] as grpc.GrpcObject, grpc.loadPackageDefinition(definition));
                const Client = scope as unknown as grpc.ServiceClientConstructor;
                const client = new Client(values.target, grpc.credentials.createInsecure());
                return new Promise((resolve, reject) => {
                    client[method](request, (error: grpc.ServiceError | null, response: Payload) =>
                        error ? reject(error) : resolve(response),
                    );
                });
            }

            async function main(): Promise<Payload> {
                switch (values.rpc) {
                    ${cases}
                    default:
                        throw new Error("unknown rpc: " + values.rpc);
                }
            }

            main().then(
                (response) => console.log(JSON.stringify(response, null, 2)),
                (error: unknown) => {
                    console.error(error instanceof Error ? error.message : error);
                    process.exit(1);
                },
            );
        ` +
        "\n"
    );
}

export default function clientTemplate(ctx: StubTemplateContext): GeneratorOutput {
    return { [clientFilePath(ctx.prefix)]: templateClient(ctx) };
}
