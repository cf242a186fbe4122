
export * from "./util";
export * from "./text";
export * from "./constants";
export * from "./types";
export * from "./errors";
export * from "./diagnostics";
export * from "./prefix";
export * from "./unify";
export * from "./ast";
export * from "./checker";

export { prettyPrint } from "./util";
