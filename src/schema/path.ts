import type { Statement } from "./types";
import { isModuleStatement } from "./types";

/**
 * Nodes that are not part of a data path: the path continues at their parent
 */
const TRANSPARENT_KEYWORDS = new Set(["choice", "case", "input", "output"]);

interface PathSegment {
    module: string;
    name: string;
}

function pathSegments(stmt: Statement): PathSegment[] {
    const segments: PathSegment[] = [];
    for (let node: Statement | undefined = stmt; node && !isModuleStatement(node); node = node.parent) {
        if (TRANSPARENT_KEYWORDS.has(node.keyword)) continue;
        segments.unshift({ module: node.module.name, name: node.arg });
    }
    return segments;
}

/**
 * Qualified schema path of a node, e.g. `/sonic-port:ports/port/ext:speed`.
 *
 * A segment carries its module name only where the owning module differs from
 * the previous segment's, so the first segment is always qualified.
 */
export function qualifiedPath(stmt: Statement): string {
    let previous: string | undefined;
    const parts = pathSegments(stmt).map(({ module, name }) => {
        const part = module === previous ? name : `${module}:${name}`;
        previous = module;
        return part;
    });
    return `/${parts.join("/")}`;
}

/**
 * Last segment of the qualified path: the JSON member name of the node
 */
export function qualifiedName(stmt: Statement): string {
    const path = qualifiedPath(stmt);
    return path.slice(path.lastIndexOf("/") + 1);
}
