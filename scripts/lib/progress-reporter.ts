/**
 * Progress Reporter for the Alumni Stats ETL
 * Provides formatted console output for tracking a pipeline run
 */

export type LineWriter = (line: string) => void;

export interface ProgressReporterOptions {
  write?: LineWriter;
  debugMode?: boolean;
  now?: () => Date;
}

export class ProgressReporter {
  private readonly write: LineWriter;
  private readonly now: () => Date;
  private debugMode: boolean;
  private startTime: Date | null = null;

  constructor(options: ProgressReporterOptions = {}) {
    this.write = options.write ?? ((line: string) => console.log(line));
    this.now = options.now ?? (() => new Date());
    this.debugMode = options.debugMode ?? false;
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  /**
   * Log the start of an ETL run
   */
  logRunStart(runName: string, dryRun: boolean): void {
    this.startTime = this.now();
    this.write('');
    this.write('╔════════════════════════════════════════════════════════════════╗');
    this.write('║  ETL Pipeline Run Started                                      ║');
    this.write('╚════════════════════════════════════════════════════════════════╝');
    this.write(`  Run Name:    ${runName}`);
    this.write(`  Mode:        ${dryRun ? 'dry-run (no warehouse writes)' : 'full'}`);
    this.write(`  Started:     ${this.startTime.toISOString()}`);
    this.write('');
  }

  /**
   * Log the start of a phase
   */
  logPhase(phase: string, phaseNumber: number, totalPhases: number): void {
    this.write('');
    this.write('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    this.write(`📦 Phase ${phaseNumber}/${totalPhases}: ${phase}`);
    this.write('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  }

  logStep(step: string, currentStep: number, totalSteps: number): void {
    this.write(`  [${currentStep}/${totalSteps}] ${step}`);
  }

  /**
   * Log step completion
   */
  logStepComplete(stepName: string, recordsProcessed?: number): void {
    let message = `    ✅ ${stepName}`;

    if (recordsProcessed !== undefined) {
      message += ` (${this.formatNumber(recordsProcessed)} rows)`;
    }

    this.write(message);
  }

  /**
   * Log step failure with its underlying detail
   */
  logStepFailure(stepName: string, error: Error, detail?: string): void {
    this.write(`    ❌ ${stepName} FAILED`);
    this.write(`       Error: ${error.message}`);
    if (detail) {
      this.write(`       └── Details: ${detail}`);
    }
  }

  logPhaseComplete(phase: string, durationSeconds: number): void {
    this.write(`✅ Phase "${phase}" completed in ${this.formatDuration(durationSeconds)}`);
  }

  /**
   * Log run completion
   */
  logRunComplete(tablesLoaded: number, tablesFailed: number): void {
    this.write('');
    this.write('╔════════════════════════════════════════════════════════════════╗');
    if (tablesFailed === 0) {
      this.write('║  ETL Pipeline Run Completed                                    ║');
    } else {
      this.write('║  ETL Pipeline Run Completed With Load Failures                 ║');
    }
    this.write('╚════════════════════════════════════════════════════════════════╝');
    this.write(`  Tables Loaded: ${tablesLoaded}`);
    this.write(`  Tables Failed: ${tablesFailed}`);
    this.write(`  Duration:      ${this.formatDuration(this.elapsedSeconds())}`);
    this.write('');
  }

  /**
   * Log run abort (nothing was loaded)
   */
  logRunAborted(error: Error): void {
    this.write('');
    this.write('╔════════════════════════════════════════════════════════════════╗');
    this.write('║  ETL Pipeline Run ABORTED                                      ║');
    this.write('╚════════════════════════════════════════════════════════════════╝');
    this.write(`  Error: ${error.message}`);
    this.write('  No tables were loaded.');
    this.write('');
  }

  logWarning(message: string): void {
    this.write(`  ⚠️  ${message}`);
  }

  logInfo(message: string): void {
    this.write(`  ℹ️  ${message}`);
  }

  logDebug(message: string): void {
    if (this.debugMode) {
      this.write(`  🐛 DEBUG: ${message}`);
    }
  }

  elapsedSeconds(): number {
    if (!this.startTime) {
      return 0;
    }
    return (this.now().getTime() - this.startTime.getTime()) / 1000;
  }

  /**
   * Format a number with thousand separators
   */
  formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  /**
   * Format duration in human-readable format
   */
  formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const secs = seconds % 60;
      return `${minutes}m ${secs.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const minutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${minutes}m`;
    }
  }
}
