export * from "./compressor.js";
