import type { Box, Point } from '../utils/raster';
import { DEFAULT_PADDING_RATIO } from './config';
import { InvalidGeometryError } from './errors';

export interface CapsuleGeometry {
  width: number;
  height: number;
  left: number;
  right: number;
  top: number;
  bottom: number;
  radius: number;
}

export interface ArcGeometry {
  left: number;
  right: number;
  top: number;
  /** Where the U's tips sit and the stem starts. */
  bottom: number;
  box: Box;
  startAngle: number;
  endAngle: number;
}

export interface MicGeometry {
  size: number;
  pad: number;
  drawWidth: number;
  drawHeight: number;
  centerX: number;
  lineWidth: number;
  capsule: CapsuleGeometry;
  arc: ArcGeometry;
  stem: { from: Point; to: Point };
  base: { from: Point; to: Point; width: number };
}

/**
 * Lays out the microphone glyph for a `size`-pixel square. Every value is an
 * integer obtained by truncation, so the glyph scales linearly with `size`.
 */
export function computeMicGeometry(size: number, paddingRatio: number = DEFAULT_PADDING_RATIO): MicGeometry {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidGeometryError(size, paddingRatio, 'size must be a positive integer');
  }
  if (!Number.isFinite(paddingRatio) || paddingRatio < 0 || paddingRatio >= 0.5) {
    // At 0.5 or above the padding swallows the whole canvas.
    throw new InvalidGeometryError(size, paddingRatio, 'padding ratio must be in [0, 0.5)');
  }

  const pad = Math.floor(size * paddingRatio);
  const w = size - 2 * pad;
  const h = size - 2 * pad;

  const cx = Math.floor(size / 2);
  const lineWidth = Math.max(1, Math.floor(size * 0.06));

  const micWidth = Math.floor(w * 0.3);
  const micHeight = Math.floor(h * 0.45);
  const radius = Math.floor(micWidth / 2);
  const capsule: CapsuleGeometry = {
    width: micWidth,
    height: micHeight,
    left: cx - radius,
    right: cx + radius,
    top: pad,
    bottom: pad + micHeight,
    radius,
  };

  const margin = Math.floor(w * 0.05);
  const spread = Math.floor(w * 0.12);
  const arcLeft = capsule.left - spread - margin;
  const arcRight = capsule.right + spread + margin;
  const arcTop = capsule.top + Math.floor(micHeight * 0.25);
  const arcBottom = capsule.bottom + Math.floor(h * 0.12);
  const arcHeight = arcBottom - arcTop;
  const arc: ArcGeometry = {
    left: arcLeft,
    right: arcRight,
    top: arcTop,
    bottom: arcBottom,
    // Only the lower half of this ellipse is stroked.
    box: [arcLeft, arcTop, arcRight, arcTop + arcHeight * 2],
    startAngle: 0,
    endAngle: 180,
  };

  const stemBottom = arcBottom + Math.floor(h * 0.15);
  const baseWidth = Math.floor(w * 0.25);
  const baseHalf = Math.floor(baseWidth / 2);

  return {
    size,
    pad,
    drawWidth: w,
    drawHeight: h,
    centerX: cx,
    lineWidth,
    capsule,
    arc,
    stem: { from: [cx, arcBottom], to: [cx, stemBottom] },
    base: { from: [cx - baseHalf, stemBottom], to: [cx + baseHalf, stemBottom], width: baseWidth },
  };
}
