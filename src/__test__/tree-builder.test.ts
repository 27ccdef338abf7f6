import { describe, expect, it } from "vitest";

import { STRUCT_VALUE_TYPE, fieldTypeName } from "../ir";
import { compileOne, findMessage, leaf, moduleDoc, stmt } from "./util";

describe("tree builder", () => {
    const module = compileOne(
        moduleDoc("sonic-system", "sys", [
            stmt("container", "system", [
                leaf("hostname", "string"),
                stmt("list", "server", [leaf("address", "string"), stmt("leaf-list", "tags", [stmt("type", "string")])]),
                stmt("choice", "clock", [
                    stmt("case", "ntp", [leaf("ntp-server", "string")]),
                    stmt("case", "manual", [leaf("epoch", "uint64")]),
                ]),
            ]),
            stmt("notification", "restarted", [leaf("reason", "string")]),
            leaf("motd", "string"),
        ]),
    );

    it("should name the module forms", () => {
        expect([module.name, module.plainName, module.pascalName]).toEqual(["sonic-system", "sonic_system", "SonicSystem"]);
    });

    it("should add a field referencing every nested message", () => {
        const system = findMessage(module.containers, "System");

        expect(system.lists.map((list) => list.name)).toEqual(["Server"]);
        expect(system.leafs.map((field) => [field.name, fieldTypeName(field.type), field.repeated, field.jsonName])).toEqual([
            ["hostname", "string", false, "hostname"],
            ["server", "Server", true, "server"],
            ["ntp_server", "string", false, "ntp-server"],
            ["epoch", "uint64", false, "epoch"],
        ]);
    });

    it("should mark leaf-lists repeated", () => {
        const server = findMessage(findMessage(module.containers, "System").lists, "Server");

        expect(server.leafs.map((field) => [field.name, field.repeated])).toEqual([
            ["address", false],
            ["tags", true],
        ]);
    });

    it("should qualify the JSON names of top-level nodes", () => {
        expect(module.leafs.map((field) => [field.name, field.jsonName])).toEqual([
            ["system", "sonic-system:system"],
            ["motd", "sonic-system:motd"],
        ]);
    });

    it("should skip notifications and produce no rpcs without rpc statements", () => {
        expect(module.containers.map((message) => message.name)).toEqual(["System"]);
        expect(module.rpcs).toEqual([]);
    });

    it("should record structured-value use", () => {
        const withUnion = compileOne(
            moduleDoc("m", "m", [stmt("leaf", "address", [stmt("type", "union", [stmt("type", "string")])])]),
        );

        expect(withUnion.usesStructValue).toBe(true);
        expect(withUnion.leafs[0] && fieldTypeName(withUnion.leafs[0].type)).toBe(STRUCT_VALUE_TYPE);
        expect(module.usesStructValue).toBe(false);
    });

    it("should build groupings like containers", () => {
        const withGrouping = compileOne(moduleDoc("m", "m", [stmt("grouping", "counters", [leaf("in-octets", "uint64")])]));

        expect(findMessage(withGrouping.containers, "Counters").leafs.map((field) => field.name)).toEqual(["in_octets"]);
    });
});
