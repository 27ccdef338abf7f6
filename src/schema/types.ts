/**
 * Statement tree consumed by the compiler.
 *
 * This is the hand-off format of the YANG frontend: every node already knows
 * its owning module, groupings and augments are expanded, and leafref paths
 * are validated and attached as `target`.
 */

/**
 * Owning-module metadata shared by every statement of a module
 */
export interface ModuleInfo {
    /** Module name, e.g. "sonic-reboot" */
    name: string;
    prefix: string;
    /** Import prefix → imported module name */
    imports: Readonly<Record<string, string>>;
}

export interface Statement {
    keyword: string;
    /** Statement argument, "" for statements without one (input, output) */
    arg: string;
    module: ModuleInfo;
    parent: Statement | undefined;
    substatements: Statement[];
    /** Pre-validated leafref target, present on leafs whose type chain ends in a leafref */
    target?: Statement;
}

/**
 * Loaded modules keyed by module name
 */
export type ModuleSet = ReadonlyMap<string, Statement>;

/**
 * Keywords whose statements are data nodes
 */
export const DATA_KEYWORDS: ReadonlySet<string> = new Set([
    "container",
    "list",
    "leaf",
    "leaf-list",
    "choice",
    "case",
    "grouping",
    "rpc",
    "notification",
    "input",
    "output",
    "anydata",
    "anyxml",
]);

export function searchOne(stmt: Statement, keyword: string): Statement | undefined {
    return stmt.substatements.find((s) => s.keyword === keyword);
}

export function search(stmt: Statement, keyword: string): Statement[] {
    return stmt.substatements.filter((s) => s.keyword === keyword);
}

export function dataChildren(stmt: Statement): Statement[] {
    return stmt.substatements.filter((s) => DATA_KEYWORDS.has(s.keyword));
}

export function isModuleStatement(stmt: Statement): boolean {
    return stmt.keyword === "module" || stmt.keyword === "submodule";
}
