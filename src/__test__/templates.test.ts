import { Project, SyntaxKind } from "ts-morph";
import { describe, expect, it } from "vitest";

import {
    clientFilePath,
    dedent,
    hostTemplate,
    registerTemplate,
    serverHandlerPath,
    serverTemplate,
    stubPrefix,
    templateClient,
    templateRegister,
    templateServerHandlers,
} from "../generator/templates";
import { compileOne, leaf, moduleDoc, stmt } from "./util";

function parse(text: string) {
    return new Project({ useInMemoryFileSystem: true }).createSourceFile("generated.ts", text);
}

const reboot = compileOne(
    moduleDoc("sonic-reboot", "reboot", [
        stmt("rpc", "reboot", [stmt("input", undefined, [leaf("delay", "uint64")]), stmt("output")]),
        stmt("rpc", "get-status", [stmt("output", undefined, [leaf("status", "string")])]),
    ]),
);
const interfaces = compileOne(moduleDoc("openconfig-interfaces", "oc-if", [stmt("container", "interfaces")]));

describe("dedent", () => {
    it("should strip the template indentation", () => {
        expect(dedent`
            a {
                b;
            }
        `).toBe("a {\n    b;\n}");
    });

    it("should indent multi-line values to their column", () => {
        const body = "one;\ntwo;";

        expect(dedent`
            block {
                ${body}
            }
        `).toBe("block {\n    one;\n    two;\n}");
    });
});

describe("server handler template", () => {
    const file = parse(templateServerHandlers(reboot));

    it("should start with the generated header", () => {
        expect(file.getFullText().split("\n")[0]).toBe("// Generated by yang2proto from YANG module sonic-reboot.");
    });

    it("should import the host contract as types", () => {
        const [declaration] = file.getImportDeclarations();

        expect(declaration?.isTypeOnly()).toBe(true);
        expect(declaration?.getModuleSpecifierValue()).toBe("../host");
        expect(declaration?.getNamedImports().map((named) => named.getName())).toEqual(["RpcHost", "RpcPayload"]);
    });

    it("should take a request only where the rpc has input", () => {
        const rebootHandler = file.getFunctionOrThrow("Reboot");
        const statusHandler = file.getFunctionOrThrow("GetStatus");

        expect(rebootHandler.isExported() && rebootHandler.isAsync()).toBe(true);
        expect(rebootHandler.getParameters().map((param) => param.getText())).toEqual(["host: RpcHost", "request: RpcPayload"]);
        expect(statusHandler.getParameters().map((param) => param.getText())).toEqual(["host: RpcHost"]);
        expect(statusHandler.getReturnTypeNodeOrThrow().getText()).toBe("Promise<RpcPayload>");
    });

    it("should forward to the host under the rpc route", () => {
        expect(
            file
                .getFunctionOrThrow("Reboot")
                .getStatements()
                .map((statement) => statement.getText()),
        ).toEqual(['await host.invoke("/sonic-reboot:reboot", request);', "return {};"]);
        expect(
            file
                .getFunctionOrThrow("GetStatus")
                .getStatements()
                .map((statement) => statement.getText()),
        ).toEqual(['return host.invoke("/sonic-reboot:get-status");']);
    });

    it("should only produce files for modules with rpcs", () => {
        const output = serverTemplate({ modules: [reboot, interfaces], prefix: "sonic", packagePrefix: "gnoi" });

        expect(Object.keys(output)).toEqual(["sonic_reboot/sonic_reboot.ts"]);
        expect(serverHandlerPath(reboot)).toBe("sonic_reboot/sonic_reboot.ts");
    });
});

describe("host template", () => {
    it("should declare the host contract", () => {
        const file = parse(hostTemplate()["host.ts"] ?? "");

        expect(file.getInterfaceOrThrow("RpcHost").getMethodOrThrow("invoke").getText()).toBe(
            "invoke(route: string, payload?: RpcPayload): Promise<RpcPayload>;",
        );
        expect(file.getInterfaceOrThrow("ServiceBinding").getProperties().map((property) => property.getName())).toEqual([
            "service",
            "protoPath",
            "handlers",
        ]);
    });
});

describe("register template", () => {
    it("should bind every handler to its service", () => {
        const output = registerTemplate({ modules: [reboot, interfaces], prefix: "sonic", packagePrefix: "gnoi" });
        const file = parse(output["sonic_register.ts"] ?? "");

        expect(file.getImportDeclarations().map((declaration) => declaration.getModuleSpecifierValue())).toEqual([
            "./host",
            "./sonic_reboot/sonic_reboot",
        ]);
        expect(file.getImportDeclarations()[1]?.getNamespaceImport()?.getText()).toBe("SonicReboot");

        const services = file
            .getVariableDeclarationOrThrow("services")
            .getInitializerIfKindOrThrow(SyntaxKind.ArrayLiteralExpression)
            .getElements();
        expect(services).toHaveLength(1);

        const binding = services[0]?.asKindOrThrow(SyntaxKind.ObjectLiteralExpression);
        const property = (name: string) =>
            binding?.getPropertyOrThrow(name).asKindOrThrow(SyntaxKind.PropertyAssignment).getInitializerOrThrow().getText();
        expect(property("service")).toBe('"gnoi.SonicReboot.SonicRebootService"');
        expect(property("protoPath")).toBe('"sonic_reboot/sonic_reboot.proto"');
        expect(
            binding
                ?.getPropertyOrThrow("handlers")
                .asKindOrThrow(SyntaxKind.PropertyAssignment)
                .getInitializerIfKindOrThrow(SyntaxKind.ObjectLiteralExpression)
                .getProperties()
                .map((handler) => handler.getText()),
        ).toEqual(["Reboot: SonicReboot.Reboot", "GetStatus: SonicReboot.GetStatus"]);
    });

    it("should export an empty list when no module has rpcs", () => {
        const file = parse(templateRegister({ modules: [interfaces], prefix: "openconfig", packagePrefix: "gnoi" }));

        expect(file.getVariableDeclarationOrThrow("services").getInitializerOrThrow().getText()).toBe("[]");
    });
});

describe("client template", () => {
    const text = templateClient({ modules: [reboot, interfaces], prefix: "sonic", packagePrefix: "gnoi" });

    it("should be an executable script", () => {
        expect(text.startsWith("#!/usr/bin/env node\n// Generated by yang2proto to call any generated RPC.\n")).toBe(true);
    });

    it("should dispatch every rpc by its full name", () => {
        const cases = parse(text)
            .getDescendantsOfKind(SyntaxKind.CaseClause)
            .map((clause) => [clause.getExpression().getText(), clause.getStatements().map((statement) => statement.getText())]);

        expect(cases).toEqual([
            [
                '"SonicRebootReboot"',
                ['return invoke("sonic_reboot/sonic_reboot.proto", "gnoi.SonicReboot.SonicRebootService", "Reboot", input());'],
            ],
            [
                '"SonicRebootGetStatus"',
                ['return invoke("sonic_reboot/sonic_reboot.proto", "gnoi.SonicReboot.SonicRebootService", "GetStatus", {});'],
            ],
        ]);
    });

    it("should be placed under the prefix directory", () => {
        expect(clientFilePath("openconfig")).toBe("openconfig_client/main.ts");
    });
});

describe("stubPrefix", () => {
    it("should pick sonic when a SONiC module has rpcs", () => {
        expect(stubPrefix([interfaces, reboot])).toBe("sonic");
        expect(stubPrefix([interfaces])).toBe("openconfig");
    });

    it("should ignore SONiC modules without rpcs", () => {
        const system = compileOne(moduleDoc("openconfig-system", "oc-sys", [stmt("rpc", "reboot")]));
        const types = compileOne(moduleDoc("sonic-types", "stypes", [stmt("typedef", "delay-ms", [stmt("type", "uint64")])]));

        expect(stubPrefix([system, types])).toBe("openconfig");
        expect(Object.keys(registerTemplate({ modules: [system, types], prefix: stubPrefix([system, types]), packagePrefix: "gnoi" }))).toEqual([
            "openconfig_register.ts",
        ]);
    });
});
