/**
 * Console output for the extractor. Progress lines are muted in silent
 * mode; warnings and errors always print.
 */

const RULE = '========================================';

export class Reporter {
  readonly silent: boolean;

  constructor(options: { silent?: boolean } = {}) {
    this.silent = options.silent ?? false;
  }

  header(title: string): void {
    if (this.silent) return;
    console.log(`\n${RULE}`);
    console.log(title);
    console.log(RULE);
  }

  info(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  success(message: string): void {
    if (this.silent) return;
    console.log(`  ✓ ${message}`);
  }

  // Indented continuation line, e.g. list items
  detail(message: string): void {
    if (this.silent) return;
    console.log(`  ${message}`);
  }

  warning(message: string): void {
    console.warn(`⚠️  ${message}`);
  }

  error(message: string): void {
    console.error(`❌ ${message}`);
  }
}
