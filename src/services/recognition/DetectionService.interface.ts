import type { DetectionRecord } from '../ingestion/DetectionParser.js';

/** Object-detection model run over a page image; records come back without text. */
export interface DetectionService {
  detect(image: Buffer): Promise<DetectionRecord[]>;
}
