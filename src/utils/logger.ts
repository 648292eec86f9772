import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

/** 接收已序列化的日志行；默认写入 stderr */
export type LogSink = (line: string) => void;

// stdout 留给 CLI 的结果输出
const stderrSink: LogSink = (line) => console.error(line);

export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink
  ) {}

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? {
          error: error.message,
          stack: error.stack,
          ...meta,
        }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  /** 派生子组件日志器，沿用当前级别与输出目标 */
  child(component: string): Logger {
    return new Logger(`${this.component}.${component}`, this.minLevel, this.sink);
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (level < this.minLevel) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };

    this.sink(JSON.stringify(entry));
  }
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

export function logPerformance(metrics: PerformanceMetrics, logger?: Logger): void {
  const target = logger ?? createLogger('performance');
  target.debug(`${metrics.operation} completed`, {
    source: metrics.component,
    duration_ms: metrics.duration,
    ...metrics.metadata,
  });
}

export function createLogger(component: string, sink?: LogSink): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel, sink);
}
