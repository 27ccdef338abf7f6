import type { Rpc } from "../ir/types";
import { createMessage, createMessageRef, sanitizeIdentifier, toPascalCase } from "../ir/utils";
import { qualifiedPath } from "../schema/path";
import { dataChildren, searchOne, type Statement } from "../schema/types";
import type { BuildContext } from "./context";
import { buildChildren } from "./tree-builder";

/**
 * Build the request or response wrapper of an RPC and add it to the module.
 * Returns whether the payload is empty.
 */
function buildWrapper(rpc: Statement, keyword: "input" | "output", name: string, ctx: BuildContext): boolean {
    const wrapper = createMessage("container", name);
    ctx.root.containers.push(wrapper);

    const payload = searchOne(rpc, keyword);
    if (!payload || dataChildren(payload).length === 0) return true;

    const inner = createMessage("container", toPascalCase(keyword));
    buildChildren(payload, inner, ctx);
    wrapper.containers.push(inner);
    wrapper.leafs.push({
        name: keyword,
        type: createMessageRef(inner.name),
        jsonName: `${rpc.module.name}:${keyword}`,
        repeated: false,
    });
    return false;
}

/**
 * Compile one `rpc` statement into its wrapper messages and method descriptor.
 */
export function extractRpc(rpc: Statement, ctx: BuildContext): Rpc {
    const requestType = toPascalCase(`${rpc.arg}_request`);
    const responseType = toPascalCase(`${rpc.arg}_response`);

    const descriptor: Rpc = {
        name: toPascalCase(`${sanitizeIdentifier(ctx.module.arg)}_${rpc.arg}`),
        methodName: toPascalCase(rpc.arg),
        route: qualifiedPath(rpc),
        requestType,
        responseType,
        inputEmpty: buildWrapper(rpc, "input", requestType, ctx),
        outputEmpty: buildWrapper(rpc, "output", responseType, ctx),
    };
    ctx.rpcs.push(descriptor);
    return descriptor;
}
