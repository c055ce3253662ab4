import type { Dimensions, Raster, ResizeResult } from "./@types/Image"
import type { RasterCodec } from "./codec"

export interface ResizedImage {
  result: ResizeResult
  bytes: Buffer
}

// picks floor or ceil of `value`, whichever scores lower (floor on a tie), never below 1
function roundAspect(value: number, score: (candidate: number) => number): number {
  const low = Math.floor(value)
  const high = Math.ceil(value)
  return Math.max(score(high) < score(low) ? high : low, 1)
}

/**
 * Largest size fitting in a box of half the original width and height,
 * keeping the aspect ratio and never upscaling.
 */
export function computeTargetDimensions(original: Dimensions): Dimensions {
  const { width, height } = original
  let boxWidth = Math.max(1, Math.floor(width / 2))
  let boxHeight = Math.max(1, Math.floor(height / 2))

  if (boxWidth >= width && boxHeight >= height) {
    return { width, height }
  }

  const aspect = width / height
  if (boxWidth / boxHeight >= aspect) {
    const fixedHeight = boxHeight
    boxWidth = roundAspect(fixedHeight * aspect, candidate => Math.abs(aspect - candidate / fixedHeight))
  } else {
    const fixedWidth = boxWidth
    boxHeight = roundAspect(fixedWidth / aspect, candidate => candidate === 0 ? 0 : Math.abs(aspect - fixedWidth / candidate))
  }

  return { width: boxWidth, height: boxHeight }
}

export async function resizeImage(raster: Raster, codec: RasterCodec): Promise<ResizedImage> {
  const original = { width: raster.width, height: raster.height }
  const target = computeTargetDimensions(original)
  const bytes = await codec.resize(raster, target)
  return {
    result: { original, target },
    bytes,
  }
}
