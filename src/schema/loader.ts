/**
 * Schema document loader
 *
 * Reads serialized statement trees (JSON or YAML) and hydrates them into
 * linked {@link Statement} nodes. Leafref targets are given as qualified
 * schema paths and are resolved to their statements here.
 */
import { readFile } from "fs/promises";
import * as yaml from "js-yaml";
import { extname } from "path";

import { ResolutionError, SchemaDocumentError } from "../errors";
import { qualifiedPath } from "./path";
import { dataChildren, type ModuleInfo, type ModuleSet, type Statement } from "./types";

export interface StatementDocument {
    keyword: string;
    arg?: string;
    /** Owning module, when it differs from the enclosing statement's (augmented nodes) */
    module?: string;
    /** Qualified path of the leafref target */
    target?: string;
    statements?: StatementDocument[];
}

export interface ModuleDocument {
    keyword: "module" | "submodule";
    name: string;
    prefix: string;
    imports: Record<string, string>;
    statements: StatementDocument[];
    /** File name or label the document was read from */
    source: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalarText(value: unknown): string | undefined {
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    return undefined;
}

function toStatementDocument(value: unknown, source: string, where: string): StatementDocument {
    if (!isRecord(value)) {
        throw new SchemaDocumentError(source, `statement at ${where} must be an object`);
    }
    const { keyword, arg, module, target, statements } = value;
    if (typeof keyword !== "string" || keyword === "") {
        throw new SchemaDocumentError(source, `statement at ${where} has no keyword`);
    }
    const doc: StatementDocument = { keyword };
    if (arg !== undefined) {
        const text = scalarText(arg);
        if (text === undefined) {
            throw new SchemaDocumentError(source, `argument of ${keyword} at ${where} must be a scalar`);
        }
        doc.arg = text;
    }
    const label = doc.arg ? `${where}/${keyword} ${doc.arg}` : `${where}/${keyword}`;
    if (module !== undefined) {
        if (typeof module !== "string") throw new SchemaDocumentError(source, `module of ${label} must be a string`);
        doc.module = module;
    }
    if (target !== undefined) {
        if (typeof target !== "string") throw new SchemaDocumentError(source, `target of ${label} must be a string`);
        doc.target = target;
    }
    if (statements !== undefined) {
        doc.statements = toStatementList(statements, source, label);
    }
    return doc;
}

function toStatementList(value: unknown, source: string, where: string): StatementDocument[] {
    if (!Array.isArray(value)) {
        throw new SchemaDocumentError(source, `statements of ${where} must be a list`);
    }
    return value.map((item) => toStatementDocument(item, source, where));
}

function toModuleDocument(value: unknown, source: string): ModuleDocument {
    if (!isRecord(value)) {
        throw new SchemaDocumentError(source, "document must be an object");
    }
    const keyword = typeof value.submodule === "string" ? "submodule" : "module";
    const name = value[keyword];
    if (typeof name !== "string" || name === "") {
        throw new SchemaDocumentError(source, 'document needs a "module" or "submodule" name');
    }
    if (typeof value.prefix !== "string" || value.prefix === "") {
        throw new SchemaDocumentError(source, `module ${name} has no prefix`);
    }

    const imports: Record<string, string> = {};
    if (value.imports !== undefined) {
        if (!isRecord(value.imports)) {
            throw new SchemaDocumentError(source, `imports of module ${name} must map prefixes to module names`);
        }
        for (const [prefix, moduleName] of Object.entries(value.imports)) {
            if (typeof moduleName !== "string") {
                throw new SchemaDocumentError(source, `import "${prefix}" of module ${name} must name a module`);
            }
            imports[prefix] = moduleName;
        }
    }

    return {
        keyword,
        name,
        prefix: value.prefix,
        imports,
        statements: value.statements === undefined ? [] : toStatementList(value.statements, source, `/${name}`),
        source,
    };
}

/**
 * Parse the text of a schema document file. JSON files hold one document or an
 * array of documents; YAML files may hold several `---` separated documents.
 * YAML scalars are not typed: `arg: 1.10` is the argument "1.10" and
 * `arg: null` the argument "null".
 */
export function parseSchemaDocuments(text: string, source: string): ModuleDocument[] {
    let values: unknown[];
    try {
        // Failsafe keeps every YAML scalar as the text it was written as
        values = extname(source) === ".json" ? [JSON.parse(text)] : yaml.loadAll(text, null, { schema: yaml.FAILSAFE_SCHEMA });
    } catch (error) {
        throw new SchemaDocumentError(source, error instanceof Error ? error.message : String(error));
    }

    return values
        .flatMap((value) => (Array.isArray(value) ? value : [value]))
        .filter((value) => value !== null && value !== undefined)
        .map((value) => toModuleDocument(value, source));
}

/**
 * Read and parse schema files in the given order
 */
export async function loadSchemaFiles(files: readonly string[]): Promise<ModuleDocument[]> {
    const documents: ModuleDocument[] = [];
    for (const file of files) {
        const text = await readFile(file, "utf-8");
        documents.push(...parseSchemaDocuments(text, file));
    }
    return documents;
}

/**
 * Find the data node named by one path segment below `node`. Choice and case
 * are looked through, as are input and output unless the segment names them.
 */
function lookupChild(node: Statement, name: string, moduleName: string): Statement | undefined {
    for (const child of dataChildren(node)) {
        if (child.keyword === "choice" || child.keyword === "case") {
            const found = lookupChild(child, name, moduleName);
            if (found) return found;
        } else if (child.keyword === "input" || child.keyword === "output") {
            if (child.keyword === name) return child;
            const found = lookupChild(child, name, moduleName);
            if (found) return found;
        } else if (child.arg === name && child.module.name === moduleName) {
            return child;
        }
    }
    return undefined;
}

function resolveTarget(path: string, leaf: Statement, modules: ModuleSet): Statement {
    const fail = () => new ResolutionError(qualifiedPath(leaf), `leafref target "${path}" does not exist`);
    const segments = path.split("/").filter(Boolean);

    let node: Statement | undefined;
    let moduleName: string | undefined;
    for (const segment of segments) {
        const colon = segment.indexOf(":");
        const name = colon === -1 ? segment : segment.slice(colon + 1);
        moduleName = colon === -1 ? moduleName : segment.slice(0, colon);
        if (moduleName === undefined) throw fail();
        const scope = node ?? modules.get(moduleName);
        if (!scope) throw fail();
        node = lookupChild(scope, name, moduleName);
        if (!node) throw fail();
    }
    if (!node) throw fail();
    return node;
}

/**
 * Link module documents into statement trees and resolve leafref targets.
 */
export function hydrateModules(documents: readonly ModuleDocument[]): ModuleSet {
    const infos = new Map<string, ModuleInfo>();
    for (const doc of documents) {
        if (infos.has(doc.name)) {
            throw new SchemaDocumentError(doc.source, `module ${doc.name} is defined more than once`);
        }
        infos.set(doc.name, { name: doc.name, prefix: doc.prefix, imports: doc.imports });
    }

    const modules = new Map<string, Statement>();
    const targets: Array<{ node: Statement; path: string }> = [];

    const hydrate = (doc: StatementDocument, parent: Statement, source: string): Statement => {
        let module = parent.module;
        if (doc.module !== undefined) {
            const owner = infos.get(doc.module);
            if (!owner) {
                throw new SchemaDocumentError(source, `statement ${doc.keyword} ${doc.arg ?? ""} is owned by unknown module ${doc.module}`);
            }
            module = owner;
        }
        const node: Statement = { keyword: doc.keyword, arg: doc.arg ?? "", module, parent, substatements: [] };
        node.substatements = (doc.statements ?? []).map((child) => hydrate(child, node, source));
        if (doc.target !== undefined) targets.push({ node, path: doc.target });
        return node;
    };

    for (const doc of documents) {
        const info = infos.get(doc.name);
        if (!info) continue;
        const root: Statement = { keyword: doc.keyword, arg: doc.name, module: info, parent: undefined, substatements: [] };
        root.substatements = doc.statements.map((child) => hydrate(child, root, doc.source));
        modules.set(doc.name, root);
    }

    for (const { node, path } of targets) {
        node.target = resolveTarget(path, node, modules);
    }

    return modules;
}
