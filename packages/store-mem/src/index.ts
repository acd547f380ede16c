export * from "./memory-vault-store.js";
