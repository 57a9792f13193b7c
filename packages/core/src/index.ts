export * from "./api";
export * from "./bundle";
export * from "./detail";
export * from "./errors";
export * from "./fields";
export * from "./filtering";
export * from "./model";
export * from "./policy";
export * from "./resource";
export * from "./supplier";
export * from "./types";
