import type { Logger } from 'pino';
import type { Config } from '../../config/validation.js';
import { DetectionParser } from '../ingestion/DetectionParser.js';
import { ContainmentClassifier, type ContainmentOptions } from '../structure/ContainmentClassifier.js';
import { loadContainmentRules } from '../structure/ContainmentRulesLoader.js';
import { HierarchyBuilder } from '../structure/HierarchyBuilder.js';
import { TableLayoutEngine } from '../tables/TableLayoutEngine.js';
import { TableProcessor } from '../tables/TableProcessor.js';
import { ReorganizationService } from '../reorganization/ReorganizationService.js';
import { FormStructurePipeline, type FormStructurePipelineOptions } from './FormStructurePipeline.js';

export interface PipelineComponents {
  parser: DetectionParser;
  builder: HierarchyBuilder;
  processor: TableProcessor;
  reorganization: ReorganizationService;
  pipeline: FormStructurePipeline;
}

type Collaborators = Pick<FormStructurePipelineOptions, 'detectionService' | 'ocrService' | 'reorganizer'>;

export class PipelineFactory {
  static containmentOptions(settings: Config['structure'], logger: Logger): ContainmentOptions {
    const options: ContainmentOptions = {
      defaultThreshold: settings.defaultThreshold,
      centerPointFallback: settings.centerPointFallback,
    };
    if (settings.rulesPath) {
      options.rules = loadContainmentRules(settings.rulesPath);
      logger.info({ path: settings.rulesPath, rules: options.rules.length }, 'Loaded containment rules');
    }
    return options;
  }

  static create(settings: Pick<Config, 'structure' | 'tables'>, logger: Logger, collaborators: Collaborators = {}): PipelineComponents {
    const parser = new DetectionParser(logger);
    const builder = new HierarchyBuilder({
      classifier: new ContainmentClassifier(PipelineFactory.containmentOptions(settings.structure, logger)),
      keepContainerText: settings.structure.keepContainerText,
      logger,
    });
    const processor = new TableProcessor(
      new TableLayoutEngine({
        rowTolerancePx: settings.tables.rowTolerancePx,
        leftMarginPx: settings.tables.leftMarginPx,
        logger,
      }),
      logger
    );
    const reorganization = new ReorganizationService(logger);

    return {
      parser,
      builder,
      processor,
      reorganization,
      pipeline: new FormStructurePipeline({ parser, builder, processor, reorganization, logger, ...collaborators }),
    };
  }
}
