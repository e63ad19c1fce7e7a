export * from "./lock";
export * from "./sweep-detector";
