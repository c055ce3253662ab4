import type { DerivedMetrics, Dimensions, ImageMetadata, ResizeResult } from "./@types/Image"
import { DivisionByZeroError } from "./errors"

export function toDimensionString({ width, height }: Dimensions) {
  return `${width}x${height}`
}

export function assertMeasurable(original: ImageMetadata) {
  if (original.sizeBytes === 0) {
    throw new DivisionByZeroError()
  }
}

export function computeDerivedMetrics(original: ImageMetadata, resized: ImageMetadata, resize: ResizeResult): DerivedMetrics {
  assertMeasurable(original)
  return {
    reductionPercentage: Math.round((1 - resized.sizeBytes / original.sizeBytes) * 100),
    dimensionChange: `${toDimensionString(resize.original)} → ${toDimensionString(resize.target)}`,
  }
}
