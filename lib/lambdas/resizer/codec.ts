import sharp, { type FormatEnum, type Metadata } from "sharp"
import type { Dimensions, Raster } from "./@types/Image"
import { DecodeError, errorMessage } from "./errors"

export interface RasterCodec {
  decode(bytes: Buffer): Promise<Raster>
  /** Resizes to exactly `target` and encodes in the raster's own format. */
  resize(raster: Raster, target: Dimensions): Promise<Buffer>
}

// format tags the output side of sharp can write back
const writableFormats: Partial<Record<string, keyof FormatEnum>> = {
  JPEG: "jpeg",
  PNG: "png",
  WEBP: "webp",
  GIF: "gif",
  TIFF: "tiff",
  AVIF: "avif",
  HEIF: "heif",
}

function toColorMode(metadata: Metadata): string {
  if (metadata.space === "cmyk") {
    return "CMYK"
  }
  switch (metadata.channels) {
    case 1:
      return "L"
    case 2:
      return "LA"
    case 3:
      return "RGB"
    case 4:
      return "RGBA"
    default:
      return metadata.space ? metadata.space.toUpperCase() : "UNKNOWN"
  }
}

export class SharpCodec implements RasterCodec {
  constructor() {
    sharp.cache(false)
  }

  async decode(bytes: Buffer): Promise<Raster> {
    let metadata: Metadata
    try {
      metadata = await sharp(bytes).metadata()
    } catch (err) {
      throw new DecodeError(`Unable to decode image: ${errorMessage(err)}`, { cause: err })
    }

    const { width, height, format } = metadata
    if (!width || !height || !format) {
      throw new DecodeError("Decoded image is missing width, height or format")
    }

    return {
      width,
      height,
      format: format.toUpperCase(),
      colorMode: toColorMode(metadata),
      data: bytes,
    }
  }

  async resize(raster: Raster, target: Dimensions): Promise<Buffer> {
    const outputFormat = writableFormats[raster.format]
    if (!outputFormat) {
      throw new DecodeError(`Can't encode images in ${raster.format} format.`)
    }

    // metadata() only reads the header, truncated pixel data surfaces here
    try {
      return await sharp(raster.data)
        .resize(target.width, target.height, { fit: "fill" })
        .toFormat(outputFormat)
        .toBuffer()
    } catch (err) {
      throw new DecodeError(`Unable to decode image: ${errorMessage(err)}`, { cause: err })
    }
  }
}
