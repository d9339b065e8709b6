import { formatTime } from './time.js';

export interface Logger {
  debug(componentName: string, message: string): void;
  info(componentName: string, message: string): void;
  warn(componentName: string, message: string): void;
  error(componentName: string, message: string): void;
}

export enum LogLevel {
  Debug,
  Info,
  Warn,
  Error,
}

/** The subset of `console` the logger writes through. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export class ConsoleLogger implements Logger {
  constructor(
    public currentLogLevel: LogLevel,
    private readonly sink: LogSink = console,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private aboveLogLevel(logLevel: LogLevel) {
    return logLevel >= this.currentLogLevel;
  }

  private formatMessage(componentName: string, message: string) {
    return `${formatTime(this.clock())} [${componentName}] ${message}`;
  }

  debug(componentName: string, message: string): void {
    if (this.aboveLogLevel(LogLevel.Debug)) {
      this.sink.debug(this.formatMessage(componentName, message));
    }
  }

  info(componentName: string, message: string): void {
    if (this.aboveLogLevel(LogLevel.Info)) {
      this.sink.info(this.formatMessage(componentName, message));
    }
  }

  warn(componentName: string, message: string): void {
    if (this.aboveLogLevel(LogLevel.Warn)) {
      this.sink.warn(this.formatMessage(componentName, message));
    }
  }

  error(componentName: string, message: string): void {
    if (this.aboveLogLevel(LogLevel.Error)) {
      this.sink.error(this.formatMessage(componentName, message));
    }
  }
}
