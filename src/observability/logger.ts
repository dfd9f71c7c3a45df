import crypto from 'crypto';

export type LogLevel = 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export interface LogContext {
  runId: string;
  storyId?: string;
  stage?: string;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  runId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  storyId?: string;
  stage?: string;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

class Logger {
  private context: LogContext | null = null;
  private threshold: LogThreshold = 'info';

  setContext(context: LogContext): void {
    this.context = context;
  }

  updateContext(partial: Partial<LogContext>): void {
    this.context = {
      runId: partial.runId ?? this.context?.runId ?? 'unknown',
      storyId: partial.storyId ?? this.context?.storyId,
      stage: partial.stage ?? this.context?.stage,
    };
  }

  getContext(): LogContext | null {
    return this.context;
  }

  clearContext(): void {
    this.context = null;
  }

  setLevel(threshold: LogThreshold): void {
    this.threshold = threshold;
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId: this.context?.runId || 'unknown',
      phase,
      message,
      data,
    };

    if (this.context?.storyId) entry.storyId = this.context.storyId;
    if (this.context?.stage) entry.stage = this.context.stage;

    console.log(JSON.stringify(entry));
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateRunId(): string {
  return crypto.randomBytes(8).toString('hex');
}
