/**
 * Human-readable progress lines. Structured diagnostics go to the pino
 * logger instead; these are what an operator watches scroll by.
 */
export interface Reporter {
  step(message: string): void;
  ok(message: string): void;
  warn(message: string): void;
  fail(message: string): void;
}

export class ConsoleReporter implements Reporter {
  step(message: string): void {
    process.stdout.write(`${message}\n`);
  }

  ok(message: string): void {
    process.stdout.write(`✓ ${message}\n`);
  }

  warn(message: string): void {
    process.stdout.write(`⚠ ${message}\n`);
  }

  fail(message: string): void {
    process.stderr.write(`✗ ${message}\n`);
  }
}
