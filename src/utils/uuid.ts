import { v4 as uuidv4 } from 'uuid';

export const RUN_ID_PREFIX = 'form';

export function generateRunId(): string {
  return `${RUN_ID_PREFIX}-${uuidv4()}`;
}
