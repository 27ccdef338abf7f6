import { describe, expect, it } from "vitest";

import { hydrateModules } from "../schema/loader";
import { qualifiedName, qualifiedPath } from "../schema/path";
import { findNode, leaf, moduleDoc, stmt } from "./util";

const modules = hydrateModules([
    moduleDoc("base", "b", [
        stmt("container", "top", [
            stmt("choice", "kind", [stmt("case", "simple", [leaf("value", "string")])]),
            { ...stmt("container", "extension", [leaf("level", "uint8")]), module: "ext" },
        ]),
        stmt("rpc", "reset", [stmt("input", undefined, [leaf("force", "boolean")]), stmt("output")]),
    ]),
    moduleDoc("ext", "e", []),
]);

describe("qualifiedPath", () => {
    it("should qualify the first segment only when the module does not change", () => {
        expect(qualifiedPath(findNode(modules, "base", "top"))).toBe("/base:top");
    });

    it("should skip choice and case", () => {
        expect(qualifiedPath(findNode(modules, "base", "top", "kind", "simple", "value"))).toBe("/base:top/value");
    });

    it("should qualify segments where the owning module changes", () => {
        expect(qualifiedPath(findNode(modules, "base", "top", "extension", "level"))).toBe("/base:top/ext:extension/level");
    });

    it("should skip rpc input and output", () => {
        expect(qualifiedPath(findNode(modules, "base", "reset", "input", "force"))).toBe("/base:reset/force");
        expect(qualifiedPath(findNode(modules, "base", "reset", "output"))).toBe("/base:reset");
    });
});

describe("qualifiedName", () => {
    it("should return the last segment of the path", () => {
        expect(qualifiedName(findNode(modules, "base", "top"))).toBe("base:top");
        expect(qualifiedName(findNode(modules, "base", "top", "extension"))).toBe("ext:extension");
        expect(qualifiedName(findNode(modules, "base", "top", "extension", "level"))).toBe("level");
    });
});
