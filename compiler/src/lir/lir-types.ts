export * from "./lir-types/index.ts";
