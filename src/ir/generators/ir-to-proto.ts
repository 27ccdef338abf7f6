/**
 * Compiled tree to proto3 text
 */
import type { CompiledModule, Leaf, Message } from "../types";
import { fieldTypeName } from "../utils";

export const DEFAULT_PACKAGE_PREFIX = "gnoi";

export interface ProtoEmitOptions {
    /** First component of the proto package, followed by the PascalCase module name */
    packagePrefix?: string;
}

const INDENT = "  ";

/**
 * Fully-qualified name of the service generated for a module
 */
export function protoServiceName(module: CompiledModule, packagePrefix = DEFAULT_PACKAGE_PREFIX): string {
    return `${packagePrefix}.${module.pascalName}.${module.pascalName}Service`;
}

/**
 * Path of a module's proto file, relative to the proto output directory
 */
export function protoFilePath(module: CompiledModule): string {
    return `${module.plainName}/${module.plainName}.proto`;
}

function fieldToString(leaf: Leaf, number: number, depth: number): string {
    const spaces = INDENT.repeat(depth);
    let proto = "";

    if (leaf.type.kind === "enum") {
        const { definition } = leaf.type;
        proto += `${spaces}enum ${definition.name} {\n`;
        for (const member of definition.members) {
            proto += `${spaces}${INDENT}${member.name} = ${member.number};\n`;
        }
        proto += `${spaces}}\n`;
    }

    const repeated = leaf.repeated ? "repeated " : "";
    proto += `${spaces}${repeated}${fieldTypeName(leaf.type)} ${leaf.name} = ${number} [json_name = "${leaf.jsonName}"];\n`;
    return proto;
}

function messageToString(message: Message, depth: number): string {
    const spaces = INDENT.repeat(depth);
    let proto = `${spaces}message ${message.name} {\n`;

    for (const list of message.lists) {
        proto += messageToString(list, depth + 1);
    }
    for (const container of message.containers) {
        proto += messageToString(container, depth + 1);
    }
    message.leafs.forEach((leaf, idx) => {
        proto += fieldToString(leaf, idx + 1, depth + 1);
    });

    proto += `${spaces}}\n`;
    return proto;
}

/**
 * Serialize a compiled module to proto3.
 *
 * The order is fixed (headers, top-level leaf wrappers, lists, containers,
 * service) and fields are numbered 1..N in the order they were added, so
 * unchanged input always yields the same text.
 */
export function irToProtobuf(module: CompiledModule, options: ProtoEmitOptions = {}): string {
    const packagePrefix = options.packagePrefix ?? DEFAULT_PACKAGE_PREFIX;

    let proto = `syntax = "proto3";\n\n`;
    proto += `package ${packagePrefix}.${module.pascalName};\n\n`;
    if (module.usesStructValue) {
        proto += `import "google/protobuf/struct.proto";\n\n`;
    }

    // Top-level leafs have no enclosing message, so each gets its own
    for (const leaf of module.leafs) {
        proto += `message ${leaf.name} {\n`;
        proto += fieldToString(leaf, 1, 1);
        proto += `}\n\n`;
    }

    for (const list of module.lists) {
        proto += messageToString(list, 0) + "\n";
    }

    for (const container of module.containers) {
        proto += messageToString(container, 0) + "\n";
    }

    if (module.rpcs.length > 0) {
        proto += `service ${module.pascalName}Service {\n`;
        for (const rpc of module.rpcs) {
            proto += `${INDENT}rpc ${rpc.methodName}(${rpc.requestType}) returns (${rpc.responseType}) {}\n`;
        }
        proto += `}\n`;
    }

    return proto;
}
