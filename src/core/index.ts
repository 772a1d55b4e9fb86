export * from "./interfaces";
export * from "./errors";
