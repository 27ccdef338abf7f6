/**
 * Utility functions for working with the compiled tree
 */
import type {
    EnumFieldType,
    FieldType,
    Leaf,
    Message,
    MessageFieldType,
    ScalarFieldType,
    ScalarType,
    StructValueFieldType,
} from "./types";

/**
 * Proto name of the structured-value placeholder
 */
export const STRUCT_VALUE_TYPE = "google.protobuf.Value";

/**
 * Convert `snake_case` or `kebab-case` to PascalCase.
 *
 * Every run of letters is title-cased, so letters after a digit start a new
 * word: `ipv6-addr` becomes `Ipv6Addr`, `get-IP` becomes `GetIp`.
 */
export function toPascalCase(name: string): string {
    return name
        .split(/[_-]+/)
        .map((part) => part.replace(/[a-zA-Z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()))
        .join("");
}

/**
 * Make a YANG identifier usable as a proto identifier
 */
export function sanitizeIdentifier(name: string): string {
    return name.replace(/-/g, "_");
}

export function createScalar(scalar: ScalarType): ScalarFieldType {
    return { kind: "scalar", scalar };
}

export function createMessageRef(name: string): MessageFieldType {
    return { kind: "message", name };
}

export function createStructValue(): StructValueFieldType {
    return { kind: "struct-value" };
}

/**
 * Create an empty message to be filled by the tree builder
 */
export function createMessage(kind: Message["kind"], name: string): MessageDraft {
    return { kind, name, containers: [], lists: [], leafs: [] };
}

/**
 * Message under construction. Assignable to {@link Message}.
 */
export interface MessageDraft extends Message {
    containers: MessageDraft[];
    lists: MessageDraft[];
    leafs: Leaf[];
}

/**
 * Check if a field type is an enum
 */
export function isEnumType(type: FieldType): type is EnumFieldType {
    return type.kind === "enum";
}

/**
 * proto3 type name of a field
 */
export function fieldTypeName(type: FieldType): string {
    switch (type.kind) {
        case "scalar":
            return type.scalar;
        case "message":
            return type.name;
        case "enum":
            return type.definition.name;
        case "struct-value":
            return STRUCT_VALUE_TYPE;
    }
}
