import type { StructureWarning } from '../services/structure/types.js';
import type { TableType } from '../services/tables/types.js';

export interface StructureRunConfig {
  input: string;
  output: string;
  reorganization?: string;
  format: 'table' | 'json';
  print: boolean;
}

export interface InputFile {
  path: string;
  name: string;
  /** File name without extension; names the output subdirectory. */
  stem: string;
}

export interface StructureProgress {
  phase: 'scanning' | 'structuring' | 'writing';
  current: number;
  total: number;
  currentFile?: string;
}

export interface FileSummary {
  fileName: string;
  documentId: string;
  status: 'processed' | 'failed';
  outputDir?: string;
  detections?: number;
  tables?: Record<string, TableType>;
  warnings?: StructureWarning[];
  rendering?: string;
  error?: string;
}

export interface StructureRunResult {
  config: StructureRunConfig;
  files: FileSummary[];
  summary: {
    total: number;
    processed: number;
    failed: number;
    tables: number;
    warnings: number;
  };
}
