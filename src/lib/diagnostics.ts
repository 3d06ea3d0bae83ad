import { logger as rootLogger, type LogLevel, type LogMetadata, type Logger } from './logger';

export type PipelineStage =
  | 'load'
  | 'channels'
  | 'reshape'
  | 'blanks'
  | 'correction'
  | 'recovery'
  | 'selection'
  | 'detection'
  | 'report';

export interface Diagnostic {
  stage: PipelineStage;
  level: LogLevel;
  message: string;
  context?: LogMetadata;
}

/**
 * Collects per-stage diagnostics for the batch result and mirrors them to the logger.
 */
export class DiagnosticLog {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly logger: Logger = rootLogger) {}

  record(stage: PipelineStage, level: LogLevel, message: string, context?: LogMetadata): void {
    this.entries.push(context ? { stage, level, message, context } : { stage, level, message });
    this.logger.log(level, message, { stage, ...context });
  }

  debug(stage: PipelineStage, message: string, context?: LogMetadata): void {
    this.record(stage, 'debug', message, context);
  }

  info(stage: PipelineStage, message: string, context?: LogMetadata): void {
    this.record(stage, 'info', message, context);
  }

  warn(stage: PipelineStage, message: string, context?: LogMetadata): void {
    this.record(stage, 'warn', message, context);
  }

  list(): Diagnostic[] {
    return [...this.entries];
  }

  warnings(): Diagnostic[] {
    return this.entries.filter(d => d.level === 'warn' || d.level === 'error');
  }
}
