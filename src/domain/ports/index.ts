/**
 * Domain Ports
 *
 * Interfaces defining what the domain needs from external systems.
 * These are implemented by infrastructure adapters.
 */

export type { FileSystem, DirectoryWalk } from "./filesystem";
export type { Logger, ProgressInfo } from "./logger";
export type { Prompt, OutputSink } from "./prompt";
