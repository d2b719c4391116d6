import { mkdir, readdir, readFile, stat, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { Logger } from 'pino';
import { silentLogger } from '../utils/silentLogger.js';
import { ValidationError } from '../utils/errors.js';
import type { FormStructurePipeline } from '../services/pipeline/FormStructurePipeline.js';
import { parseReorganizationPlan } from '../services/reorganization/ReorganizationService.js';
import type { ReorganizationPlan } from '../services/reorganization/DocumentReorganizer.interface.js';
import { printHierarchy } from '../services/serialization/HierarchyPrinter.js';
import type { TableType } from '../services/tables/types.js';
import type { ProgressReporter } from './reporters/ProgressReporter.js';
import type { FileSummary, InputFile, StructureRunConfig, StructureRunResult } from './types.js';

export const OUTPUT_FILES = {
  hierarchy: 'document_structure.json',
  extractedTables: 'extracted_tables.json',
  processedTables: 'processed_tables.json',
  finalDocument: 'final_structured_document.json',
} as const;

const SUPPORTED_EXTENSIONS = new Set(['.json']);

const readJson = async (path: string): Promise<unknown> => {
  const content = await readFile(path, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`${path} is not valid JSON`, error instanceof Error ? error.message : error);
  }
};

const writeJson = (path: string, data: unknown): Promise<void> =>
  writeFile(path, JSON.stringify(data, null, 2) + '\n', 'utf-8');

/** Structures every detection file of a file or folder input, one output folder per file. */
export class BatchStructurer {
  constructor(
    private pipeline: FormStructurePipeline,
    private logger: Logger = silentLogger
  ) {}

  async run(config: StructureRunConfig, reporter: ProgressReporter): Promise<StructureRunResult> {
    reporter.update({ phase: 'scanning', current: 0, total: 0 });
    const files = await this.scanInput(config.input);
    reporter.complete(`Found ${files.length} detection files`);

    const plan = config.reorganization ? await this.loadPlan(config.reorganization) : undefined;

    const result: StructureRunResult = {
      config,
      files: [],
      summary: { total: files.length, processed: 0, failed: 0, tables: 0, warnings: 0 },
    };

    for (let i = 0; i < files.length; i++) {
      const file = files[i];
      reporter.update({ phase: 'structuring', current: i + 1, total: files.length, currentFile: file.name });

      const summary = await this.structureFile(file, config, plan, reporter, { index: i + 1, total: files.length });
      result.files.push(summary);

      if (summary.status === 'processed') {
        result.summary.processed++;
        result.summary.tables += Object.keys(summary.tables ?? {}).length;
        result.summary.warnings += summary.warnings?.length ?? 0;
        if (summary.warnings && summary.warnings.length > 0) {
          reporter.warn(`${file.name}: ${summary.warnings.length} structure warnings`);
        }
      } else {
        result.summary.failed++;
        reporter.error(`${file.name}: ${summary.error}`);
      }
    }

    reporter.complete(
      `Structuring complete: ${result.summary.processed} processed, ${result.summary.failed} failed`
    );
    return result;
  }

  private async structureFile(
    file: InputFile,
    config: StructureRunConfig,
    plan: ReorganizationPlan | undefined,
    reporter: ProgressReporter,
    position: { index: number; total: number }
  ): Promise<FileSummary> {
    try {
      const records = await readJson(file.path);
      const structured = await this.pipeline.run(records, { reorganization: plan });

      reporter.update({ phase: 'writing', current: position.index, total: position.total, currentFile: file.name });
      const outputDir = join(config.output, file.stem);
      await mkdir(outputDir, { recursive: true });
      await writeJson(join(outputDir, OUTPUT_FILES.hierarchy), structured.hierarchy);
      await writeJson(join(outputDir, OUTPUT_FILES.extractedTables), structured.extractedTables);
      await writeJson(join(outputDir, OUTPUT_FILES.processedTables), structured.processedTables);
      await writeJson(join(outputDir, OUTPUT_FILES.finalDocument), structured.finalDocument);

      const tables: Record<string, TableType> = {};
      for (const [tableId, table] of Object.entries(structured.processedTables)) {
        tables[tableId] = table.table_type;
      }

      this.logger.info({ file: file.name, outputDir, documentId: structured.documentId }, 'Wrote structured outputs');

      return {
        fileName: file.name,
        documentId: structured.documentId,
        status: 'processed',
        outputDir,
        detections: Array.isArray(records) ? records.length : 0,
        tables,
        warnings: structured.warnings,
        ...(config.print && { rendering: printHierarchy(structured.finalDocument) }),
      };
    } catch (error) {
      this.logger.error({ file: file.name, error }, 'Structuring failed');
      return {
        fileName: file.name,
        documentId: '',
        status: 'failed',
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  private async loadPlan(path: string): Promise<ReorganizationPlan> {
    const plan = parseReorganizationPlan(await readJson(path));
    this.logger.info({ path, sections: Object.keys(plan.structure).length }, 'Loaded reorganization plan');
    return plan;
  }

  private async scanInput(input: string): Promise<InputFile[]> {
    const stats = await stat(input);
    if (stats.isFile()) {
      return [this.toInputFile(input)];
    }

    const files: InputFile[] = [];
    const entries = await readdir(input, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isFile() && SUPPORTED_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
        files.push(this.toInputFile(join(input, entry.name)));
      }
    }
    return files.sort((a, b) => a.name.localeCompare(b.name));
  }

  private toInputFile(path: string): InputFile {
    const name = basename(path);
    return { path, name, stem: basename(name, extname(name)) };
  }
}
