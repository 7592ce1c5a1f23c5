import { RasterCanvas } from '../utils/raster';
import { ACCENT, DEFAULT_PADDING_RATIO, TINT } from './config';
import { computeMicGeometry } from './geometry';

/**
 * Draws the microphone glyph on a transparent `size × size` canvas: an
 * accent capsule, then a tint U-arc, stem and base on top of it.
 *
 * @throws {InvalidGeometryError} when `size` or `paddingRatio` leave no drawable region
 */
export function renderMicIcon(size: number, paddingRatio: number = DEFAULT_PADDING_RATIO): RasterCanvas {
  const { capsule, arc, stem, base, lineWidth } = computeMicGeometry(size, paddingRatio);
  const canvas = new RasterCanvas(size, size);

  // Capsule: top cap, body, bottom cap
  canvas.fillEllipse([capsule.left, capsule.top, capsule.right, capsule.top + capsule.width], ACCENT);
  canvas.fillRect([capsule.left, capsule.top + capsule.radius, capsule.right, capsule.bottom], ACCENT);
  canvas.fillEllipse(
    [capsule.left, capsule.bottom - capsule.radius, capsule.right, capsule.bottom + capsule.radius],
    ACCENT,
  );

  canvas.strokeArc(arc.box, arc.startAngle, arc.endAngle, TINT, lineWidth);
  canvas.strokeLine(stem.from, stem.to, TINT, lineWidth);
  canvas.strokeLine(base.from, base.to, TINT, lineWidth);

  return canvas;
}

export function renderIconSet(
  sizes: readonly number[],
  paddingRatio: number = DEFAULT_PADDING_RATIO,
): Map<number, RasterCanvas> {
  return new Map(sizes.map((size): [number, RasterCanvas] => [size, renderMicIcon(size, paddingRatio)]));
}
