import type { EnumDefinition, Leaf } from "../ir/types";
import { toPascalCase } from "../ir/utils";
import { type Statement, search } from "../schema/types";

/**
 * An enumeration declared by a leaf of the message being built
 */
export interface EnumDeclaration {
    /** Field created for the declaring leaf */
    leaf: Leaf;
    /** Qualified schema path of the declaring leaf */
    node: string;
    /** Member names as declared, whether or not an enum was emitted */
    memberNames: ReadonlySet<string>;
}

const PROTO_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type EnumCompileResult =
    | { ok: true; memberNames: ReadonlySet<string>; definition: EnumDefinition }
    | { ok: false; memberNames: ReadonlySet<string>; reason: string; conflicts: readonly EnumDeclaration[] };

/**
 * Compile a `type enumeration` statement for the leaf named `leafName`.
 *
 * proto3 scopes enum values to the enclosing message, so the members of one
 * leaf's enum may neither name a field of that message (`fieldNames`) nor
 * appear in the enumeration of any sibling leaf. On a sibling overlap the
 * result lists the conflicting siblings; the caller downgrades them along with
 * this leaf. Members are numbered from 0 in declaration order
 * and `value` statements are not carried over.
 */
export function compileEnumeration(
    type: Statement,
    leafName: string,
    siblings: readonly EnumDeclaration[],
    fieldNames: ReadonlySet<string> = new Set(),
): EnumCompileResult {
    const memberNames = new Set(search(type, "enum").map((member) => member.arg));
    const declared = [...memberNames];
    const conflicts = siblings.filter((sibling) => declared.some((name) => sibling.memberNames.has(name)));

    const malformed = declared.find((name) => !PROTO_IDENTIFIER.test(name));
    if (malformed !== undefined) {
        return { ok: false, memberNames, conflicts, reason: `enum member "${malformed}" is not a valid proto identifier` };
    }

    const field = declared.find((name) => fieldNames.has(name));
    if (field !== undefined) {
        return { ok: false, memberNames, conflicts, reason: `enum member "${field}" is also the name of field ${field}` };
    }

    const first = conflicts[0];
    if (first) {
        const shared = declared.find((name) => first.memberNames.has(name));
        return {
            ok: false,
            memberNames,
            conflicts,
            reason: `enum member "${shared}" is also declared by sibling ${first.leaf.name}`,
        };
    }

    return {
        ok: true,
        memberNames,
        definition: {
            name: toPascalCase(leafName),
            members: declared.map((name, number) => ({ name, number })),
            memberNames,
        },
    };
}
