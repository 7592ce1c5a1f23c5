import path from 'path';
import { fileURLToPath } from 'url';
import type { Rgba } from '../utils/raster';

export const ICON_SIZES = [16, 32, 48, 64, 128, 256] as const;

export type IconSize = (typeof ICON_SIZES)[number];

export const DEFAULT_PADDING_RATIO = 0.15;

// #a855f7
export const ACCENT: Rgba = [168, 85, 247, 255];
export const TINT: Rgba = [196, 140, 255, 255];

export type ArtifactFormat = 'png' | 'ico';

export interface ArtifactSpec {
  fileName: string;
  format: ArtifactFormat;
  /** Size of the render the artifact is encoded from. */
  source: IconSize;
  /** Bitmap sizes stored in the file. */
  sizes: readonly IconSize[];
}

// Downstream consumers look these names up verbatim.
export const ARTIFACTS: readonly ArtifactSpec[] = [
  { fileName: '32x32.png', format: 'png', source: 32, sizes: [32] },
  { fileName: 'icon.png', format: 'png', source: 256, sizes: [256] },
  { fileName: 'icon.ico', format: 'ico', source: 256, sizes: ICON_SIZES },
];

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

export const DEFAULT_OUTPUT_DIR = path.join(projectRoot, 'src-tauri', 'icons');

/**
 * Output directory for a CLI run: the first positional argument resolved
 * against `cwd`, or {@link DEFAULT_OUTPUT_DIR}.
 */
export const resolveOutputDir = (argv: readonly string[], cwd: string = process.cwd()): string => {
  const [target] = argv.filter((arg) => !arg.startsWith('-'));
  return target ? path.resolve(cwd, target) : DEFAULT_OUTPUT_DIR;
};
