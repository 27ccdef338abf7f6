import type { SchemaLimitation } from "../errors";
import type { Message, Rpc } from "../ir/types";
import type { MessageDraft } from "../ir/utils";
import type { Logger } from "../logger";
import type { ModuleSet, Statement } from "../schema/types";
import type { EnumDeclaration } from "./enum-compiler";

/**
 * State threaded through the recursive build of one module.
 *
 * Module-level facts (RPC descriptors, structured-value use, limitations) are
 * recorded here instead of on the node being built.
 */
export interface BuildContext {
    readonly modules: ModuleSet;
    /** The module statement being compiled */
    readonly module: Statement;
    /** Top-level message of the module; RPC wrappers are added to it */
    readonly root: MessageDraft;
    readonly rpcs: Rpc[];
    readonly limitations: SchemaLimitation[];
    readonly log: Logger;
    /** Enumerations declared so far, per message */
    readonly enumScopes: Map<Message, EnumDeclaration[]>;
    usesStructValue: boolean;
}
