export * from "./digest.js";
export * from "./key-deriver.js";
