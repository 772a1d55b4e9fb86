export * from "./node";
