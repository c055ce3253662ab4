import fs from "fs-extra"
import type { ImageMetadata, Raster } from "./@types/Image"
import type { RasterCodec } from "./codec"

export interface DecodedImage {
  raster: Raster
  metadata: ImageMetadata
}

export function toImageMetadata(raster: Raster, sizeBytes: number): ImageMetadata {
  return Object.freeze({
    width: raster.width,
    height: raster.height,
    format: raster.format,
    colorMode: raster.colorMode,
    sizeBytes,
  })
}

/**
 * Decodes the image stored at `path`. `sizeBytes` is the length of the file
 * itself, not of the decoded pixels.
 */
export async function extractMetadata(path: string, codec: RasterCodec): Promise<DecodedImage> {
  const bytes = await fs.readFile(path)
  const raster = await codec.decode(bytes)
  return {
    raster,
    metadata: toImageMetadata(raster, bytes.byteLength),
  }
}
