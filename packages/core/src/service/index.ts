export * from "./vault-service.js";
