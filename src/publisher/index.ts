/**
 * Publisher module
 *
 * Building and publishing docs and packages through external command contracts.
 */

export * from "./publisher";
export * from "./command";
export * from "./integrity";
export type * from "./publisher.types";
