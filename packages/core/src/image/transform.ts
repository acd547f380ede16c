import { type RasterImage, rasterPipeline, readRaster } from "./raster-image.js";

/**
 * Produces the rendition that gets compressed for a target edge.
 *
 * The default is a plain resize. A learned model can take its place by
 * implementing `infer`; nothing else in the ingest path changes.
 */
export interface ImageTransform {
  infer(image: RasterImage, targetEdge: number): Promise<RasterImage>;
}

/**
 * Stretch an image to exactly `width` x `height`, ignoring aspect ratio.
 */
export async function resizeImage(
  image: RasterImage,
  width: number,
  height: number = width,
): Promise<RasterImage> {
  return readRaster(rasterPipeline(image).resize(width, height, { fit: "fill" }));
}

export const resizeTransform: ImageTransform = {
  infer: (image, targetEdge) => resizeImage(image, targetEdge),
};
