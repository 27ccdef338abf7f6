/**
 * Compiled schema tree
 *
 * This module defines the tree that sits between the YANG statement tree and
 * the generated outputs (proto3 text, server handlers, client program).
 *
 * - The compiler lowers statements into this tree, once per module
 * - Generators read it; nothing mutates it after compilation
 */
import type { SchemaLimitation } from "../errors";

/**
 * proto3 scalar types a YANG base type can map to
 */
export type ScalarType = "int32" | "int64" | "uint32" | "uint64" | "sint64" | "bool" | "bytes" | "string";

/**
 * One enumeration member with its assigned tag
 */
export interface EnumMember {
    name: string;
    number: number;
}

/**
 * Enumeration compiled from a leaf's `type enumeration`
 */
export interface EnumDefinition {
    /** PascalCase name of the declaring leaf */
    name: string;
    members: readonly EnumMember[];
    /** Member names, for cross-sibling collision checks */
    memberNames: ReadonlySet<string>;
}

/**
 * Scalar field type
 */
export interface ScalarFieldType {
    kind: "scalar";
    scalar: ScalarType;
}

/**
 * Field typed by a message of the same tree
 */
export interface MessageFieldType {
    kind: "message";
    name: string;
}

/**
 * Field typed by an enum emitted right before it
 */
export interface EnumFieldType {
    kind: "enum";
    definition: EnumDefinition;
}

/**
 * Field typed by the generic structured value (google.protobuf.Value).
 * Unions resolve to this, whatever their member types.
 */
export interface StructValueFieldType {
    kind: "struct-value";
}

export type FieldType = ScalarFieldType | MessageFieldType | EnumFieldType | StructValueFieldType;

/**
 * A field of a message
 */
export interface Leaf {
    /** Field identifier, hyphens replaced by underscores */
    name: string;
    type: FieldType;
    /** JSON member name, module-qualified where the owning module changes */
    jsonName: string;
    /** leaf-list or list reference */
    repeated: boolean;
}

/**
 * A message: YANG container, grouping or list, or a synthetic RPC wrapper.
 * Lists have the same shape and are referenced through a repeated field.
 */
export interface Message {
    kind: "container" | "list";
    name: string;
    containers: readonly Message[];
    lists: readonly Message[];
    leafs: readonly Leaf[];
}

/**
 * Method descriptor recorded for every RPC
 */
export interface Rpc {
    /** PascalCase of `<module>_<rpc>`, unique across modules */
    name: string;
    /** PascalCase of the rpc name, used inside the module's service */
    methodName: string;
    /** Qualified schema path of the rpc, the route the host dispatches on */
    route: string;
    requestType: string;
    responseType: string;
    /** No input or input without children: zero-payload request */
    inputEmpty: boolean;
    /** No output or output without children: the response carries nothing */
    outputEmpty: boolean;
}

/**
 * Result of compiling one YANG module
 */
export interface CompiledModule {
    /** Module name as declared, e.g. "sonic-reboot" */
    name: string;
    /** Name with hyphens replaced by underscores, used for file names */
    plainName: string;
    /** PascalCase name, used for the proto package and service */
    pascalName: string;
    containers: readonly Message[];
    lists: readonly Message[];
    leafs: readonly Leaf[];
    rpcs: readonly Rpc[];
    /** A union was resolved somewhere in the module */
    usesStructValue: boolean;
    limitations: readonly SchemaLimitation[];
}
