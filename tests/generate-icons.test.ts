import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import fs from 'fs';
import os from 'os';
import { spawn } from 'child_process';
import { fileURLToPath } from 'url';

const projectRoot = path.resolve(fileURLToPath(new URL('..', import.meta.url)));
const scriptPath = path.join(projectRoot, 'scripts', 'generate-icons.ts');

interface CliResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

const runCli = (args: string[]): Promise<CliResult> =>
  new Promise((resolve, reject) => {
    const proc = spawn(process.execPath, ['--import', 'tsx', scriptPath, ...args], {
      cwd: projectRoot,
      env: { ...process.env, NODE_ENV: 'production' },
    });
    let stdout = '';
    let stderr = '';
    proc.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on('close', (code) => resolve({ code, stdout, stderr }));
    proc.on('error', reject);
  });

describe('generate-icons CLI', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'mic-icons-cli-'));
  });

  afterEach(async () => {
    await fs.promises.rm(workDir, { recursive: true, force: true });
  });

  it('writes the three icons and exits 0', async () => {
    const outputDir = path.join(workDir, 'icons');

    const result = await runCli([outputDir]);

    expect(result.code).toBe(0);
    expect((await fs.promises.readdir(outputDir)).sort()).toEqual(['32x32.png', 'icon.ico', 'icon.png']);
    expect(result.stdout).toContain('[INFO] [GenerateIcons] Done: 3 files written');
  });

  it('exits 1 and names the failing artifact when the directory cannot be created', async () => {
    const blocker = path.join(workDir, 'blocker');
    await fs.promises.writeFile(blocker, 'not a directory');
    const target = path.join(blocker, 'icons');

    const result = await runCli([target]);

    expect(result.code).toBe(1);
    const errorLine = result.stderr.split('\n').find((line) => line.includes('[ERROR]'));
    expect(errorLine).toContain(`[ERROR] [GenerateIcons] Failed to create output directory at ${target}: `);
    expect(fs.existsSync(target)).toBe(false);
  });
});
