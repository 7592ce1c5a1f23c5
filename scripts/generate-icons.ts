import { exportIcons } from '../src/lib/exporter';
import { resolveOutputDir } from '../src/lib/config';
import { createLogger } from '../src/utils/logger';

const log = createLogger('GenerateIcons');

async function main() {
    const outputDir = resolveOutputDir(process.argv.slice(2));
    log.info('Generating microphone icons', { outputDir });

    const artifacts = await exportIcons(outputDir);
    log.info(`Done: ${artifacts.length} files written`, { files: artifacts.map((artifact) => artifact.name) });
}

main().catch((error: unknown) => {
    log.error(error instanceof Error ? error.message : 'Icon generation failed', { error });
    process.exit(1);
});
