import path from 'path';
import fs from 'fs';
import sharp from 'sharp';
import { ARTIFACTS, resolveOutputDir } from '../src/lib/config';
import type { ArtifactSpec } from '../src/lib/config';
import { readIcoEntries } from '../src/lib/ico';

const outputDir = resolveOutputDir(process.argv.slice(2));

// Returns the sizes found in the file, in file order.
async function readSizes(artifact: ArtifactSpec, filePath: string): Promise<number[]> {
    const buffer = await fs.promises.readFile(filePath);
    if (artifact.format === 'ico') {
        return readIcoEntries(buffer).map((entry) => entry.width);
    }

    const { width, height, hasAlpha } = await sharp(buffer).metadata();
    if (!hasAlpha) throw new Error('PNG has no alpha channel');
    if (width !== height) throw new Error(`PNG is not square: ${width}x${height}`);
    return width === undefined ? [] : [width];
}

async function runVerification() {
    console.log(`=== ICON VERIFICATION (${outputDir}) ===`);
    let failures = 0;

    for (const artifact of ARTIFACTS) {
        const filePath = path.join(outputDir, artifact.fileName);
        try {
            const sizes = await readSizes(artifact, filePath);
            const expected = [...artifact.sizes].sort((a, b) => a - b);
            const actual = [...sizes].sort((a, b) => a - b);
            if (actual.join(',') !== expected.join(',')) {
                throw new Error(`expected sizes ${expected.join(', ')}, found ${actual.join(', ')}`);
            }
            console.log(`PASS: ${artifact.fileName} (${actual.join(', ')})`);
        } catch (e) {
            failures++;
            console.error(`FAIL: ${artifact.fileName}:`, e instanceof Error ? e.message : e);
        }
    }

    if (failures > 0) {
        console.error(`=== ${failures} CHECK(S) FAILED ===`);
        process.exit(1);
    }
    console.log("=== ALL CHECKS PASSED ===");
}

runVerification().catch((e: unknown) => {
    console.error("FAIL: Verification aborted", e);
    process.exit(1);
});
