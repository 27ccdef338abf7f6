import { vi } from "vitest";

import { compileModules } from "../compiler";
import type { CompiledModule, Message } from "../ir/types";
import type { Logger } from "../logger";
import { hydrateModules, type ModuleDocument, type StatementDocument } from "../schema/loader";
import { dataChildren, type ModuleSet, type Statement } from "../schema/types";

export function stmt(keyword: string, arg?: string, statements: StatementDocument[] = []): StatementDocument {
    return arg === undefined ? { keyword, statements } : { keyword, arg, statements };
}

export function leaf(name: string, type: string): StatementDocument {
    return stmt("leaf", name, [stmt("type", type)]);
}

export function enumLeaf(name: string, members: string[]): StatementDocument {
    return stmt("leaf", name, [stmt("type", "enumeration", members.map((member) => stmt("enum", member)))]);
}

export function leafref(name: string, target: string): StatementDocument {
    return { ...stmt("leaf", name, [stmt("type", "leafref")]), target };
}

export function moduleDoc(
    name: string,
    prefix: string,
    statements: StatementDocument[],
    imports: Record<string, string> = {},
): ModuleDocument {
    return { keyword: "module", name, prefix, imports, statements, source: `${name}.yaml` };
}

export function compile(documents: ModuleDocument[], log?: Logger): CompiledModule[] {
    return compileModules(hydrateModules(documents), { log });
}

export function compileOne(document: ModuleDocument, log?: Logger): CompiledModule {
    const [module] = compile([document], log);
    if (!module) throw new Error(`module ${document.name} was not compiled`);
    return module;
}

/**
 * Walk data nodes by name; input and output are matched by keyword
 */
export function findNode(modules: ModuleSet, moduleName: string, ...path: string[]): Statement {
    let node = modules.get(moduleName);
    if (!node) throw new Error(`module ${moduleName} is not loaded`);
    for (const name of path) {
        const child: Statement | undefined = dataChildren(node).find(
            (candidate) => candidate.arg === name || (candidate.arg === "" && candidate.keyword === name),
        );
        if (!child) throw new Error(`no data node ${name} below ${node.arg}`);
        node = child;
    }
    return node;
}

export function findMessage(messages: readonly Message[], name: string): Message {
    const message = messages.find((candidate) => candidate.name === name);
    if (!message) throw new Error(`no message ${name}`);
    return message;
}

export function createTestLogger() {
    return {
        info: vi.fn<(message: string) => void>(),
        warn: vi.fn<(message: string) => void>(),
        error: vi.fn<(message: string) => void>(),
    };
}

export function messages(fn: { mock: { calls: unknown[][] } }): unknown[] {
    return fn.mock.calls.map((call) => call[0]);
}
