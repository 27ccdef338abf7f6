/**
 * yang2proto
 *
 * Compiles YANG RPC modules into proto3 schemas, TypeScript server handler
 * skeletons, a service registration file and a client dispatch program.
 */

export { compileSchemas, writeArtifacts, type CompileReport, type CompileSchemasOptions } from "./cli/compile";
export { resolveConfig, type CompilerConfig, type CompilerOptions } from "./cli/config";
export { ChangeAwareWriter } from "./cli/writer";
export * from "./compiler";
export * from "./errors";
export * from "./generator/templates";
export { DEFAULT_PACKAGE_PREFIX, irToProtobuf, protoFilePath, protoServiceName, type ProtoEmitOptions } from "./ir/generators/ir-to-proto";
export * from "./ir";
export { createLogger, silentLogger, type Logger } from "./logger";
export { hydrateModules, loadSchemaFiles, parseSchemaDocuments, type ModuleDocument, type StatementDocument } from "./schema/loader";
export { qualifiedName, qualifiedPath } from "./schema/path";
export * from "./schema/types";
