import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, writeFile, readFile, readdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { runCli, USAGE_LINES, type CliDependencies } from '../../src/cli/index.js';
import type { PdfLoader } from '../../src/extractors/index.js';
import { createFakeLoader } from '../helpers/fake-pdf.js';

const TITLE = '# PDFから抽出されたテキスト\n\n';

describe('runCli', () => {
  let testDir: string;
  let programDir: string;
  let inputPath: string;
  let stdout: string[];
  let stderr: string[];

  const run = (args: string[], overrides: CliDependencies = {}) =>
    runCli(['node', 'pdf-page-md', ...args], {
      env: {},
      programDir,
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      ...overrides,
    });

  beforeEach(async () => {
    testDir = join(tmpdir(), `pdf-page-md-cli-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    programDir = join(testDir, 'program');
    await mkdir(programDir, { recursive: true });
    inputPath = join(testDir, 'report.pdf');
    await writeFile(inputPath, '%PDF-1.4');
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should write to the default output directory', async () => {
    await mkdir(join(programDir, 'output'));
    const { loader } = createFakeLoader(['One', 'Two', 'Three']);
    const outputPath = join(programDir, 'output', 'report.md');

    const exitCode = await run([inputPath], { loader });

    expect(exitCode).toBe(0);
    expect(await readFile(outputPath, 'utf-8')).toBe(
      TITLE +
        '## Page 1\n\nOne\n\n---\n\n' +
        '## Page 2\n\nTwo\n\n---\n\n' +
        '## Page 3\n\nThree\n\n---\n\n'
    );
    expect(stderr).toEqual([`[INFO] Default output: '${outputPath}'`]);
    expect(stdout).toEqual([`Markdown saved: ${outputPath}`]);
  });

  it('should write into a directory given with --output', async () => {
    const outDir = join(testDir, 'existing_dir');
    await mkdir(outDir);
    const { loader } = createFakeLoader(['Text']);

    const exitCode = await run([inputPath, '--output', outDir], { loader });

    expect(exitCode).toBe(0);
    expect(await readdir(outDir)).toEqual(['report.md']);
  });

  it('should write to a new file given with -o verbatim', async () => {
    const custom = join(testDir, 'custom.md');
    const { loader } = createFakeLoader(['Text']);

    const exitCode = await run([inputPath, '-o', custom], { loader });

    expect(exitCode).toBe(0);
    expect(await readFile(custom, 'utf-8')).toBe(`${TITLE}## Page 1\n\nText\n\n---\n\n`);
  });

  it('should take --output from the environment', async () => {
    const custom = join(testDir, 'from-env.md');
    const { loader } = createFakeLoader(['Text']);

    const exitCode = await run([inputPath], { loader, env: { PDF_PAGE_MD_OUTPUT: custom } });

    expect(exitCode).toBe(0);
    expect(stdout).toEqual([`Markdown saved: ${custom}`]);
  });

  it('should apply the placeholder policy from the command line', async () => {
    const custom = join(testDir, 'out.md');
    const { loader } = createFakeLoader([undefined]);

    const exitCode = await run([inputPath, '-o', custom, '--empty-page', 'placeholder'], { loader });

    expect(exitCode).toBe(0);
    expect(await readFile(custom, 'utf-8')).toBe(`${TITLE}## Page 1\n\n(空のページ)\n\n---\n\n`);
  });

  it('should print usage and exit 1 without an input', async () => {
    const { loader } = createFakeLoader([]);

    const exitCode = await run([], { loader });

    expect(exitCode).toBe(1);
    expect(stderr).toEqual(['[ERROR] Missing required argument: input PDF path']);
    expect(stdout).toEqual([...USAGE_LINES]);
    expect(loader).not.toHaveBeenCalled();
  });

  it('should exit 1 for a missing input before opening any PDF', async () => {
    await mkdir(join(programDir, 'output'));
    const missing = join(testDir, 'missing.pdf');
    const { loader } = createFakeLoader(['Text']);

    const exitCode = await run([missing], { loader });

    expect(exitCode).toBe(1);
    expect(stderr).toEqual([`[ERROR] Input file '${missing}' was not found`]);
    expect(loader).not.toHaveBeenCalled();
    expect(await readdir(join(programDir, 'output'))).toEqual([]);
  });

  it('should exit 1 and write nothing when the default output directory is missing', async () => {
    const { loader } = createFakeLoader(['Text']);

    const exitCode = await run([inputPath], { loader });

    expect(exitCode).toBe(1);
    expect(stderr[0]).toContain(`Default output directory '${join(programDir, 'output')}'`);
    expect(loader).not.toHaveBeenCalled();
    expect(await readdir(programDir)).toEqual([]);
  });

  it('should exit 1 when the PDF cannot be opened', async () => {
    const custom = join(testDir, 'out.md');
    const loader = vi.fn<PdfLoader>(async () => {
      throw new Error('Invalid PDF structure.');
    });

    const exitCode = await run([inputPath, '-o', custom], { loader });

    expect(exitCode).toBe(1);
    expect(stderr.at(-1)).toBe(`[ERROR] Could not open PDF '${inputPath}': Invalid PDF structure.`);
    expect((await readdir(testDir)).sort()).toEqual(['program', 'report.pdf']);
  });

  it('should exit 1 when the output cannot be written', async () => {
    const target = join(testDir, 'no-such-dir', 'out.md');
    const { loader } = createFakeLoader(['Text']);

    const exitCode = await run([inputPath, '-o', target], { loader });

    expect(exitCode).toBe(1);
    expect(stderr.at(-1)).toContain(`[ERROR] Failed to write '${target}'`);
  });

  it('should report an over-long --output name as a write failure', async () => {
    const longOutput = join(testDir, `${'o'.repeat(300)}.md`);
    const { loader } = createFakeLoader(['Text']);

    const exitCode = await run([inputPath, '-o', longOutput], { loader });

    expect(exitCode).toBe(1);
    expect(stderr.at(-1)).toContain(`[ERROR] Failed to write '${longOutput}': ENAMETOOLONG`);
  });

  it('should exit 1 for invalid environment configuration', async () => {
    const exitCode = await run([inputPath], { env: { PDF_PAGE_MD_EMPTY_PAGE: 'skip' } });

    expect(exitCode).toBe(1);
    expect(stderr[0]).toContain('[ERROR] Invalid environment configuration: PDF_PAGE_MD_EMPTY_PAGE');
  });

  it('should reject an unknown --empty-page value', async () => {
    const exitCode = await run([inputPath, '--empty-page', 'skip']);

    expect(exitCode).toBe(1);
    expect(stderr.join('\n')).toContain("'skip' is invalid");
  });

  it('should print the version and exit 0', async () => {
    const exitCode = await run(['--version']);

    expect(exitCode).toBe(0);
    expect(stdout).toEqual(['1.0.0']);
  });

  it('should log debug detail with --verbose', async () => {
    const custom = join(testDir, 'out.md');
    const { loader } = createFakeLoader(['A', null]);

    const exitCode = await run([inputPath, '-o', custom, '--verbose'], { loader });

    expect(exitCode).toBe(0);
    expect(stderr).toContain('[DEBUG] Output resolution: file-new');
    expect(stderr).toContain('[DEBUG] Pages: 2, written: 1, skipped: 1');
  });
});
