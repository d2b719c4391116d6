import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const parseNumber = (value: string | undefined, parse: (raw: string) => number): number | undefined =>
  value ? parse(value) : undefined;

function loadConfig(): Config {
  const rawConfig = {
    server: {
      nodeEnv: process.env.NODE_ENV,
      port: parseNumber(process.env.PORT, raw => parseInt(raw, 10)),
      logLevel: process.env.LOG_LEVEL,
    },
    structure: {
      defaultThreshold: parseNumber(process.env.CONTAINMENT_DEFAULT_THRESHOLD, parseFloat),
      centerPointFallback: process.env.CONTAINMENT_CENTER_POINT_FALLBACK !== 'false',
      keepContainerText: process.env.KEEP_CONTAINER_TEXT === 'true',
      rulesPath: process.env.CONTAINMENT_RULES_PATH || undefined,
    },
    tables: {
      rowTolerancePx: parseNumber(process.env.TABLE_ROW_TOLERANCE_PX, parseFloat),
      leftMarginPx: parseNumber(process.env.TABLE_LEFT_MARGIN_PX, parseFloat),
    },
    output: {
      directory: process.env.OUTPUT_DIR || undefined,
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
