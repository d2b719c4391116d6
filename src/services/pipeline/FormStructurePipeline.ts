import type { Logger } from 'pino';
import { silentLogger } from '../../utils/silentLogger.js';
import { generateRunId } from '../../utils/uuid.js';
import { CollaboratorError, ConfigurationError } from '../../utils/errors.js';
import { DetectionParser, type DetectionRecord } from '../ingestion/DetectionParser.js';
import { ContainmentClassifier, type ContainmentOptions } from '../structure/ContainmentClassifier.js';
import { HierarchyBuilder } from '../structure/HierarchyBuilder.js';
import type { StructureWarning } from '../structure/types.js';
import { serializeHierarchy, type SerializedDocument } from '../serialization/HierarchySerializer.js';
import { TableExtractor } from '../tables/TableExtractor.js';
import { TableLayoutEngine, type TableLayoutOptions } from '../tables/TableLayoutEngine.js';
import { TableProcessor } from '../tables/TableProcessor.js';
import type { ExtractedTables, ProcessedTables } from '../tables/types.js';
import { ReorganizationService } from '../reorganization/ReorganizationService.js';
import type {
  DocumentReorganizer,
  ReorganizationPlanInput,
} from '../reorganization/DocumentReorganizer.interface.js';
import type { DetectionService } from '../recognition/DetectionService.interface.js';
import type { OcrService } from '../recognition/OcrService.interface.js';

export interface FormStructurePipelineOptions {
  /** Prebuilt stages; when given, the matching settings below are ignored. */
  parser?: DetectionParser;
  builder?: HierarchyBuilder;
  processor?: TableProcessor;
  reorganization?: ReorganizationService;
  containment?: ContainmentOptions;
  keepContainerText?: boolean;
  tableLayout?: Omit<TableLayoutOptions, 'logger'>;
  logger?: Logger;
  detectionService?: DetectionService;
  ocrService?: OcrService;
  reorganizer?: DocumentReorganizer;
}

export interface PipelineRunOptions {
  /** Precomputed plan; takes precedence over the configured reorganizer. */
  reorganization?: ReorganizationPlanInput;
  skipReorganization?: boolean;
}

export interface PipelineResult {
  documentId: string;
  hierarchy: SerializedDocument;
  extractedTables: ExtractedTables;
  processedTables: ProcessedTables;
  finalDocument: SerializedDocument;
  reorganized: boolean;
  warnings: StructureWarning[];
  processingTime: string;
}

export class FormStructurePipeline {
  private parser: DetectionParser;
  private builder: HierarchyBuilder;
  private extractor: TableExtractor;
  private processor: TableProcessor;
  private reorganization: ReorganizationService;
  private logger: Logger;

  constructor(private options: FormStructurePipelineOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.parser = options.parser ?? new DetectionParser(this.logger);
    this.builder =
      options.builder ??
      new HierarchyBuilder({
        classifier: new ContainmentClassifier(options.containment),
        keepContainerText: options.keepContainerText,
        logger: this.logger,
      });
    this.extractor = new TableExtractor(this.logger);
    this.processor =
      options.processor ??
      new TableProcessor(new TableLayoutEngine({ ...options.tableLayout, logger: this.logger }), this.logger);
    this.reorganization = options.reorganization ?? new ReorganizationService(this.logger);
  }

  async run(records: unknown, runOptions: PipelineRunOptions = {}): Promise<PipelineResult> {
    const startTime = Date.now();
    const documentId = generateRunId();
    this.logger.info({ documentId }, 'Starting form structuring');

    const parsed = this.parser.parse(records);
    const built = this.builder.build(parsed.detections);
    const hierarchy = serializeHierarchy(built.root);

    const extractedTables = this.extractor.extractTables(built.root);
    const processedTables = this.processor.processTables(extractedTables);
    const merged = this.processor.mergeProcessedTables(built.root, processedTables);

    const warnings = [...parsed.warnings, ...built.warnings, ...merged.warnings];
    let finalRoot = merged.root;
    let reorganized = false;

    const plan = runOptions.skipReorganization
      ? undefined
      : runOptions.reorganization ?? (await this.requestReorganization(documentId, serializeHierarchy(finalRoot)));

    if (plan !== undefined) {
      const applied = this.reorganization.apply(finalRoot, plan);
      finalRoot = applied.root;
      warnings.push(...applied.warnings);
      reorganized = true;
    }

    const processingTime = `${Date.now() - startTime}ms`;
    this.logger.info(
      {
        documentId,
        detections: parsed.detections.length,
        tables: Object.keys(processedTables).length,
        warnings: warnings.length,
        processingTime,
      },
      'Form structuring complete'
    );

    return {
      documentId,
      hierarchy,
      extractedTables,
      processedTables,
      finalDocument: serializeHierarchy(finalRoot),
      reorganized,
      warnings,
      processingTime,
    };
  }

  /** Runs the detection and OCR collaborators before structuring. */
  async processImage(image: Buffer, runOptions: PipelineRunOptions = {}): Promise<PipelineResult> {
    const { detectionService, ocrService } = this.options;
    if (!detectionService || !ocrService) {
      throw new ConfigurationError('Image processing needs both a detection service and an OCR service');
    }

    let records: DetectionRecord[];
    try {
      const detections = await detectionService.detect(image);
      this.logger.info({ count: detections.length }, 'Detection complete');
      records = await ocrService.recognize(image, detections);
      this.logger.info({ count: records.length }, 'OCR complete');
    } catch (error) {
      this.logger.error({ error }, 'Recognition collaborator failed');
      throw new CollaboratorError('Detection or OCR failed', error);
    }

    return this.run(records, runOptions);
  }

  private async requestReorganization(
    documentId: string,
    hierarchy: SerializedDocument
  ): Promise<ReorganizationPlanInput | undefined> {
    const { reorganizer } = this.options;
    if (!reorganizer) return undefined;

    try {
      return await reorganizer.reorganize(hierarchy);
    } catch (error) {
      this.logger.error({ documentId, error }, 'Reorganizer failed');
      throw new CollaboratorError('Document reorganizer failed', error);
    }
  }
}
