/**
 * Compiled schema tree module
 *
 * The tree every generator in yang2proto reads from.
 */

export * from "./types";
export * from "./utils";
