/**
 * Leaf type resolution
 *
 * Chases typedefs and leafrefs down to a YANG base type and maps that to
 * proto3.
 */
import { ResolutionError } from "../errors";
import type { ScalarType } from "../ir/types";
import { qualifiedPath } from "../schema/path";
import { type ModuleSet, type Statement, search, searchOne } from "../schema/types";

export type ResolvedType =
    | { kind: "scalar"; scalar: ScalarType }
    /** Needs the enum compiler; `statement` is the `type enumeration` statement */
    | { kind: "enumeration"; statement: Statement }
    | { kind: "struct-value" };

const SCALAR_TYPES: Readonly<Record<string, ScalarType>> = {
    int8: "int32",
    int16: "int32",
    int32: "int32",
    int64: "int64",
    uint8: "uint32",
    uint16: "uint32",
    uint32: "uint32",
    uint64: "uint64",
    decimal64: "sint64",
    boolean: "bool",
    binary: "bytes",
    bits: "bytes",
    string: "string",
    identityref: "string",
    "instance-identifier": "string",
    empty: "string",
};

const BASE_TYPES: ReadonlySet<string> = new Set([...Object.keys(SCALAR_TYPES), "enumeration", "union", "leafref"]);

function typedefIn(scope: Statement, name: string): Statement | undefined {
    return search(scope, "typedef").find((typedef) => typedef.arg === name);
}

/**
 * Find the typedef a non-base type name refers to.
 *
 * Unprefixed names (or names carrying the owning module's own prefix) are
 * looked up in the enclosing statements first, then at module scope. Other
 * prefixes go through the owning module's imports.
 */
function findTypedef(type: Statement, modules: ModuleSet, leaf: Statement): Statement {
    const colon = type.arg.indexOf(":");
    const prefix = colon === -1 ? undefined : type.arg.slice(0, colon);
    const name = colon === -1 ? type.arg : type.arg.slice(colon + 1);
    const owner = type.module;

    let typedef: Statement | undefined;
    if (prefix === undefined || prefix === owner.prefix) {
        for (let scope = type.parent; scope && !typedef; scope = scope.parent) {
            typedef = typedefIn(scope, name);
        }
        const moduleScope = modules.get(owner.name);
        if (!typedef && moduleScope) typedef = typedefIn(moduleScope, name);
    } else {
        const moduleName = owner.imports[prefix];
        if (moduleName === undefined) {
            throw new ResolutionError(qualifiedPath(leaf), `prefix "${prefix}" of type ${type.arg} is not an import of module ${owner.name}`);
        }
        const imported = modules.get(moduleName);
        if (!imported) {
            throw new ResolutionError(qualifiedPath(leaf), `module ${moduleName} imported as "${prefix}" is not loaded`);
        }
        typedef = typedefIn(imported, name);
    }

    if (!typedef) {
        throw new ResolutionError(
            qualifiedPath(leaf),
            `typedef ${type.arg} is not found, make sure all dependent modules are present`,
        );
    }
    return typedef;
}

function typeOf(stmt: Statement, leaf: Statement): Statement {
    const type = searchOne(stmt, "type");
    if (!type) {
        throw new ResolutionError(qualifiedPath(leaf), `${stmt.keyword} ${stmt.arg} has no type`);
    }
    return type;
}

/**
 * Resolve the type of a leaf or leaf-list statement.
 */
export function resolveLeafType(leaf: Statement, modules: ModuleSet): ResolvedType {
    return resolve(leaf, modules, new Set());
}

function resolve(leaf: Statement, modules: ModuleSet, visited: Set<Statement>): ResolvedType {
    if (visited.has(leaf)) {
        throw new ResolutionError(qualifiedPath(leaf), "leafref chain loops back to this leaf");
    }
    visited.add(leaf);

    let type = typeOf(leaf, leaf);
    const typedefs = new Set<Statement>();
    while (!BASE_TYPES.has(type.arg)) {
        const typedef = findTypedef(type, modules, leaf);
        if (typedefs.has(typedef)) {
            throw new ResolutionError(qualifiedPath(leaf), `typedef ${typedef.arg} refers to itself`);
        }
        typedefs.add(typedef);
        type = typeOf(typedef, leaf);
    }

    if (type.arg === "leafref") {
        const target = leaf.target;
        if (!target) {
            throw new ResolutionError(qualifiedPath(leaf), "leafref has no resolved target");
        }
        if (target.keyword !== "leaf" && target.keyword !== "leaf-list") {
            throw new ResolutionError(
                qualifiedPath(leaf),
                `leafref points to ${target.keyword} ${qualifiedPath(target)}, not to a leaf or leaf-list`,
            );
        }
        return resolve(target, modules, visited);
    }
    if (type.arg === "enumeration") return { kind: "enumeration", statement: type };
    if (type.arg === "union") return { kind: "struct-value" };

    const scalar = SCALAR_TYPES[type.arg];
    if (scalar === undefined) {
        throw new ResolutionError(qualifiedPath(leaf), `no proto type mapping for YANG type ${type.arg}`);
    }
    return { kind: "scalar", scalar };
}
