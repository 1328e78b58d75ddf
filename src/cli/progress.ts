/**
 * ProgressReporter
 *
 * Structured console output for CLI operations.
 */

export class ProgressReporter {
  constructor(private readonly quiet: boolean = false) {}

  startTask(name: string): void {
    if (this.quiet) return;
    console.log(`⏳ ${name}...`);
  }

  completeTask(name: string): void {
    if (this.quiet) return;
    console.log(`✅ ${name}`);
  }

  failTask(name: string, err: Error): void {
    console.error(`❌ ${name}: ${err.message}`);
  }

  logWritten(target: string, bytes: number): void {
    if (this.quiet) return;
    console.log(`💾 Wrote ${bytes} bytes to ${target}`);
  }

  logInfo(message: string): void {
    if (this.quiet) return;
    console.log(`ℹ️  ${message}`);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }
}
