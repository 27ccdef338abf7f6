/**
 * Lowers YANG data statements into messages and fields.
 */
import type { Leaf } from "../ir/types";
import {
    createMessage,
    createMessageRef,
    createScalar,
    createStructValue,
    isEnumType,
    sanitizeIdentifier,
    toPascalCase,
    type MessageDraft,
} from "../ir/utils";
import { qualifiedName, qualifiedPath } from "../schema/path";
import { dataChildren, type Statement } from "../schema/types";
import type { BuildContext } from "./context";
import { compileEnumeration } from "./enum-compiler";
import { extractRpc } from "./rpc-extractor";
import { resolveLeafType } from "./type-resolver";

/**
 * Build the data children of `node` into `parent`.
 *
 * - rpc: handed to the RPC extractor, never a field
 * - notification: skipped
 * - choice/case: flattened into `parent`
 * - container/grouping and list: nested message plus a field referencing it
 * - leaf/leaf-list: resolved and added as a field
 */
export function buildChildren(node: Statement, parent: MessageDraft, ctx: BuildContext): void {
    for (const child of dataChildren(node)) {
        switch (child.keyword) {
            case "rpc":
                extractRpc(child, ctx);
                break;
            case "choice":
            case "case":
                buildChildren(child, parent, ctx);
                break;
            case "container":
            case "grouping":
                buildMessage(child, "container", parent, ctx);
                break;
            case "list":
                buildMessage(child, "list", parent, ctx);
                break;
            case "leaf":
            case "leaf-list":
                buildLeaf(child, parent, ctx);
                break;
            default:
                // notification, anydata, anyxml
                break;
        }
    }
}

function buildMessage(stmt: Statement, kind: "container" | "list", parent: MessageDraft, ctx: BuildContext): void {
    const message = createMessage(kind, toPascalCase(stmt.arg));
    buildChildren(stmt, message, ctx);

    if (kind === "list") parent.lists.push(message);
    else parent.containers.push(message);

    const field: Leaf = {
        name: sanitizeIdentifier(stmt.arg),
        type: createMessageRef(message.name),
        jsonName: qualifiedName(stmt),
        repeated: kind === "list",
    };
    addField(parent, field, ctx);
}

/**
 * Append a field; enums of the message that declare a member of the same name
 * fall back to string
 */
function addField(parent: MessageDraft, leaf: Leaf, ctx: BuildContext): void {
    parent.leafs.push(leaf);
    for (const declaration of ctx.enumScopes.get(parent) ?? []) {
        if (isEnumType(declaration.leaf.type) && declaration.memberNames.has(leaf.name)) {
            downgradeEnum(declaration.leaf, declaration.node, `enum member "${leaf.name}" is also the name of field ${leaf.name}`, ctx);
        }
    }
}

function downgradeEnum(leaf: Leaf, node: string, reason: string, ctx: BuildContext): void {
    ctx.limitations.push({ node, reason });
    ctx.log.info(`[INFO] - Due to protobuf limitation changing type to string from enum for leaf-${leaf.jsonName}: ${reason}`);
    leaf.type = createScalar("string");
}

function buildLeaf(stmt: Statement, parent: MessageDraft, ctx: BuildContext): void {
    const leaf: Leaf = {
        name: sanitizeIdentifier(stmt.arg),
        type: createScalar("string"),
        jsonName: qualifiedName(stmt),
        repeated: stmt.keyword === "leaf-list",
    };
    addField(parent, leaf, ctx);

    const resolved = resolveLeafType(stmt, ctx.modules);
    if (resolved.kind === "scalar") {
        leaf.type = createScalar(resolved.scalar);
        return;
    }
    if (resolved.kind === "struct-value") {
        ctx.usesStructValue = true;
        leaf.type = createStructValue();
        return;
    }

    let scope = ctx.enumScopes.get(parent);
    if (!scope) {
        scope = [];
        ctx.enumScopes.set(parent, scope);
    }

    const node = qualifiedPath(stmt);
    const fieldNames = new Set(parent.leafs.map((field) => field.name));
    const result = compileEnumeration(resolved.statement, stmt.arg, scope, fieldNames);
    if (result.ok) {
        leaf.type = { kind: "enum", definition: result.definition };
    } else {
        downgradeEnum(leaf, node, result.reason, ctx);
        // Siblings sharing a member lose their enum as well
        for (const conflict of result.conflicts) {
            if (!isEnumType(conflict.leaf.type)) continue;
            const shared = [...result.memberNames].find((name) => conflict.memberNames.has(name));
            downgradeEnum(conflict.leaf, conflict.node, `enum member "${shared}" is also declared by sibling ${leaf.name}`, ctx);
        }
    }
    scope.push({ leaf, node, memberNames: result.memberNames });
}
