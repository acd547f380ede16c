export * from "./raster-image.js";
export * from "./transform.js";
