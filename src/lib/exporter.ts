import path from 'path';
import fs from 'fs';
import { createLogger } from '../utils/logger';
import type { RasterCanvas } from '../utils/raster';
import { ARTIFACTS, DEFAULT_PADDING_RATIO, ICON_SIZES } from './config';
import type { ArtifactSpec } from './config';
import { encodeIco, encodePng } from './encoder';
import { FilesystemError } from './errors';
import { readIcoEntries } from './ico';
import { renderIconSet } from './renderer';

const log = createLogger('Exporter');

export interface ExportOptions {
  paddingRatio?: number;
}

export interface ExportedArtifact {
  name: string;
  path: string;
  sizes: number[];
}

// Each source size is PNG-encoded once and shared by every artifact built from it.
const encodeArtifact = async (
  artifact: ArtifactSpec,
  renders: Map<number, RasterCanvas>,
  pngCache: Map<number, Buffer>,
): Promise<Buffer> => {
  let png = pngCache.get(artifact.source);
  if (!png) {
    const canvas = renders.get(artifact.source);
    if (!canvas) {
      throw new Error(`No ${artifact.source}px render for ${artifact.fileName}`);
    }
    png = await encodePng(canvas);
    pngCache.set(artifact.source, png);
  }
  return artifact.format === 'ico' ? encodeIco(png, artifact.sizes) : png;
};

const writeArtifact = async (name: string, filePath: string, contents: Buffer): Promise<void> => {
  try {
    await fs.promises.writeFile(filePath, contents);
  } catch (error) {
    throw new FilesystemError(name, filePath, error);
  }
};

/**
 * Renders the icon at every size in {@link ICON_SIZES} and writes
 * `32x32.png`, `icon.png` and `icon.ico` into `outputDir`, creating it when
 * missing. Rejects with {@link FilesystemError} on the first failed write.
 */
export async function exportIcons(outputDir: string, options: ExportOptions = {}): Promise<ExportedArtifact[]> {
  const paddingRatio = options.paddingRatio ?? DEFAULT_PADDING_RATIO;

  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new FilesystemError('output directory', outputDir, error, 'create');
  }

  const renders = renderIconSet(ICON_SIZES, paddingRatio);
  log.debug('Rendered icon set', { sizes: [...renders.keys()], paddingRatio });

  const pngCache = new Map<number, Buffer>();
  const written: ExportedArtifact[] = [];
  for (const artifact of ARTIFACTS) {
    const filePath = path.join(outputDir, artifact.fileName);
    const contents = await encodeArtifact(artifact, renders, pngCache);
    await writeArtifact(artifact.fileName, filePath, contents);

    const sizes =
      artifact.format === 'ico' ? readIcoEntries(contents).map((entry) => entry.width) : [...artifact.sizes];
    log.info(`Saved ${artifact.fileName}`, { path: filePath, sizes });
    written.push({ name: artifact.fileName, path: filePath, sizes });
  }

  return written;
}
