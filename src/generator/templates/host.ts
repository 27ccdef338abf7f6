/**
 * Static host contract imported by the server handlers and the registration
 */
import { dedent } from "./dedent";
import { generatedHeader, HOST_MODULE } from "./helpers";
import type { GeneratorOutput } from "./types";

export function templateHost(): string {
    return (
        generatedHeader("as the contract between generated handlers and their host") +
        "\n" +
        dedent`
            /** JSON form of a request or response message */
            export type RpcPayload = Record<string, unknown>;

            /**
             * Implemented by the server hosting the handlers. \`route\` is the
             * qualified YANG path of the RPC.
             */
            export interface RpcHost {
                invoke(route: string, payload?: RpcPayload): Promise<RpcPayload>;
            }

            export type RpcHandler = (host: RpcHost, request: RpcPayload) => Promise<RpcPayload>;

            export interface ServiceBinding {
                /** Fully-qualified proto service name */
                service: string;
                /** Proto file, relative to the proto output directory */
                protoPath: string;
                handlers: Record<string, RpcHandler>;
            }
        ` +
        "\n"
    );
}

export default function hostTemplate(): GeneratorOutput {
    return { [`${HOST_MODULE}.ts`]: templateHost() };
}
