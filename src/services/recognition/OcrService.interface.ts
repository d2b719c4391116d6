import type { DetectionRecord } from '../ingestion/DetectionParser.js';

/** Fills `text` of each detection from its cropped region of the page. */
export interface OcrService {
  recognize(image: Buffer, detections: DetectionRecord[]): Promise<DetectionRecord[]>;
}
