import type { StructureProgress } from '../types.js';

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
} as const;

type Tone = Exclude<keyof typeof ANSI, 'reset'>;

const paint = (tone: Tone, text: string): string => `${ANSI[tone]}${text}${ANSI.reset}`;

const PHASE_LABELS: Record<StructureProgress['phase'], string> = {
  scanning: 'Scanning input',
  structuring: 'Structuring',
  writing: 'Writing outputs',
};

/**
 * Single-line progress for interactive terminals. Errors are always printed,
 * to stderr, so a piped `--format json` run still reports failed files.
 */
export class ProgressReporter {
  private interactive: boolean;
  private pending = 0;

  constructor(enabled: boolean = true) {
    this.interactive = enabled && process.stdout.isTTY === true;
  }

  update({ phase, current, total, currentFile }: StructureProgress): void {
    if (!this.interactive) return;
    const counter = total > 0 ? paint('cyan', `[${current}/${total}] `) : '';
    const file = currentFile ? paint('dim', ` ${currentFile}`) : '';
    this.rewrite(`${counter}${PHASE_LABELS[phase]}${file}`);
  }

  complete(message: string): void {
    if (this.interactive) this.finish(`${paint('green', '✓')} ${message}`);
  }

  warn(message: string): void {
    if (this.interactive) this.finish(`${paint('yellow', '⚠')} ${message}`);
  }

  error(message: string): void {
    this.erase();
    console.error(`${paint('red', '✗')} ${message}`);
  }

  private rewrite(line: string): void {
    this.erase();
    process.stdout.write(line);
    this.pending = line.length;
  }

  private finish(line: string): void {
    this.erase();
    console.log(line);
  }

  private erase(): void {
    if (this.pending === 0) return;
    process.stdout.write(`\r${' '.repeat(this.pending)}\r`);
    this.pending = 0;
  }
}
