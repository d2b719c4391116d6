import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { BatchStructurer, OUTPUT_FILES } from '../index.js';
import { ProgressReporter } from '../reporters/ProgressReporter.js';
import type { StructureRunConfig } from '../types.js';
import { FormStructurePipeline } from '../../services/pipeline/FormStructurePipeline.js';
import { FORM_RECORDS, record } from '../../__tests__/fixtures.js';

let workDir: string;
let inputDir: string;
let outputDir: string;

const structurer = new BatchStructurer(new FormStructurePipeline());
const reporter = new ProgressReporter(false);

const runConfig = (overrides: Partial<StructureRunConfig> = {}): StructureRunConfig => ({
  input: inputDir,
  output: outputDir,
  format: 'json',
  print: false,
  ...overrides,
});

const readJson = async (path: string): Promise<unknown> => JSON.parse(await readFile(path, 'utf-8'));

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'form-structure-'));
  inputDir = join(workDir, 'detections');
  outputDir = join(workDir, 'output');
  await mkdir(inputDir);
  await writeFile(join(inputDir, 'page1.json'), JSON.stringify(FORM_RECORDS));
  await writeFile(join(inputDir, 'notes.txt'), 'ignored');
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe('BatchStructurer', () => {
  test('writes the four outputs for every detection file', async () => {
    const result = await structurer.run(runConfig(), reporter);

    expect(result.summary).toEqual({ total: 1, processed: 1, failed: 0, tables: 1, warnings: 0 });
    expect((await readdir(join(outputDir, 'page1'))).sort()).toEqual([
      OUTPUT_FILES.extractedTables,
      OUTPUT_FILES.hierarchy,
      OUTPUT_FILES.finalDocument,
      OUTPUT_FILES.processedTables,
    ].sort());

    const processed = await readJson(join(outputDir, 'page1', OUTPUT_FILES.processedTables));
    expect(processed).toMatchObject({ t1: { table_type: 'SingleHeader' } });
    expect(result.files[0].tables).toEqual({ t1: 'SingleHeader' });
    expect(result.files[0].detections).toBe(FORM_RECORDS.length);
  });

  test('accepts a single file as input', async () => {
    const result = await structurer.run(runConfig({ input: join(inputDir, 'page1.json') }), reporter);
    expect(result.files.map(file => file.fileName)).toEqual(['page1.json']);
  });

  test('applies a reorganization plan and renders the outline', async () => {
    const planPath = join(workDir, 'plan.json');
    await writeFile(planPath, JSON.stringify({ cleaned_text: { o1: 'Owner signature' } }));

    const result = await structurer.run(runConfig({ reorganization: planPath, print: true }), reporter);

    const final = await readJson(join(outputDir, 'page1', OUTPUT_FILES.finalDocument));
    expect(final).toMatchObject({ children: [{ id: 's1', children: [{ id: 't1' }, { id: 'o1', text: 'Owner signature' }] }] });
    expect(result.files[0].rendering?.split('\n').pop()).toBe('    field: Owner signature');
  });

  test('reports the writing phase and files with warnings', async () => {
    await writeFile(
      join(inputDir, 'page2.json'),
      JSON.stringify([...FORM_RECORDS, record('flat', 'field', 10, 10, 0, 5)])
    );
    const watched = new ProgressReporter(false);
    const update = vi.spyOn(watched, 'update');
    const warn = vi.spyOn(watched, 'warn');

    await structurer.run(runConfig(), watched);

    expect(update).toHaveBeenCalledWith({ phase: 'writing', current: 1, total: 2, currentFile: 'page1.json' });
    expect(update).toHaveBeenCalledWith({ phase: 'writing', current: 2, total: 2, currentFile: 'page2.json' });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('page2.json: 1 structure warnings');
  });

  test('reports unreadable files without stopping the batch', async () => {
    await writeFile(join(inputDir, 'broken.json'), '{ not json');

    const result = await structurer.run(runConfig(), reporter);

    expect(result.summary).toMatchObject({ total: 2, processed: 1, failed: 1 });
    expect(result.files.map(file => [file.fileName, file.status])).toEqual([
      ['broken.json', 'failed'],
      ['page1.json', 'processed'],
    ]);
  });
});
