// src/logger.ts

import { FUNCTION_CODE_NAMES, exceptionMessage } from './constants/constants.js';
import {
  LogContext,
  LogField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/modbus-types.js';

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

const CONSOLE_METHODS: Record<LogLevel, ConsoleMethod> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

const VALID_FIELDS: LogField[] = [
  'timestamp',
  'level',
  'logger',
  'unitId',
  'funcCode',
  'exceptionCode',
  'address',
  'quantity',
  'responseTime',
  'attempt',
];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = [
    'timestamp',
    'level',
    'logger',
    'unitId',
    'funcCode',
    'exceptionCode',
    'address',
    'quantity',
    'responseTime',
    'attempt',
  ];
  private customFormatters: Partial<Record<LogField, (value: unknown) => string>> = {};
  private filters: {
    unitId: Set<number>;
    funcCode: Set<number>;
    exceptionCode: Set<number>;
  } = { unitId: new Set(), funcCode: new Set(), exceptionCode: new Set() };
  private watchCallback: ((record: LogRecord) => void) | null = null;
  private logRateLimit: number = 0;
  private lastLogTime: number = 0;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  private formatField(field: LogField, value: unknown, fallback: (v: unknown) => string): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Builds the header and message parts of a log line.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const ctx: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);

    if (this.logFormat.includes('logger') && ctx.logger) {
      headerParts.push(this.formatField('logger', ctx.logger, v => `[${String(v)}]`));
    }
    if (this.logFormat.includes('unitId') && ctx.unitId != null) {
      headerParts.push(this.formatField('unitId', ctx.unitId, v => `[U:${String(v)}]`));
    }
    if (this.logFormat.includes('funcCode') && ctx.funcCode != null) {
      const funcName = FUNCTION_CODE_NAMES.get(ctx.funcCode) ?? 'Unknown';
      const funcCode = `0x${ctx.funcCode.toString(16).padStart(2, '0')}`;
      headerParts.push(this.formatField('funcCode', funcCode, v => `[F:${String(v)}/${funcName}]`));
    }
    if (this.logFormat.includes('exceptionCode') && ctx.exceptionCode != null) {
      const exceptionName = exceptionMessage(ctx.exceptionCode);
      headerParts.push(
        this.formatField('exceptionCode', ctx.exceptionCode, v => `[E:${String(v)}/${exceptionName}]`)
      );
    }
    if (this.logFormat.includes('address') && ctx.address != null) {
      headerParts.push(this.formatField('address', ctx.address, v => `[A:${String(v)}]`));
    }
    if (this.logFormat.includes('quantity') && ctx.quantity != null) {
      headerParts.push(this.formatField('quantity', ctx.quantity, v => `[Q:${String(v)}]`));
    }
    if (this.logFormat.includes('responseTime') && ctx.responseTime != null) {
      headerParts.push(this.formatField('responseTime', ctx.responseTime, v => `[RT:${String(v)}ms]`));
    }
    if (this.logFormat.includes('attempt') && ctx.attempt != null) {
      headerParts.push(this.formatField('attempt', ctx.attempt, v => `[#${String(v)}]`));
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  /**
   * Determines whether a message passes the level, category and mute filters.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.unitId != null && this.filters.unitId.has(context.unitId)) return false;
    if (context.funcCode != null && this.filters.funcCode.has(context.funcCode)) return false;
    if (context.exceptionCode != null && this.filters.exceptionCode.has(context.exceptionCode))
      return false;

    const category = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (category === 'none') return false;
    const threshold = category ?? this.currentLevel;
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext, immediate = false): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now: number = Date.now();
    if (!immediate && this.logRateLimit > 0 && now - this.lastLogTime < this.logRateLimit) return;
    this.lastLogTime = now;

    console[CONSOLE_METHODS[level]](...this.format(level, args, context));
  }

  /**
   * A trailing plain object is taken as the log context.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (
        typeof lastArg === 'object' &&
        lastArg !== null &&
        !Array.isArray(lastArg) &&
        !(lastArg instanceof Error)
      ) {
        return { args: args.slice(0, -1), context: { ...lastArg } };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra }, level === 'warn' || level === 'error');
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${String(level)}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${String(level)}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setRateLimit(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: LogField, formatter: (value: unknown) => string): void {
    if (!VALID_FIELDS.includes(field) || field === 'timestamp' || field === 'level') {
      throw new Error(`Invalid formatter field: ${field}`);
    }
    this.customFormatters[field] = formatter;
  }

  mute({ unitId, funcCode, exceptionCode }: Partial<LogContext> = {}): void {
    if (unitId != null) this.filters.unitId.add(unitId);
    if (funcCode != null) this.filters.funcCode.add(funcCode);
    if (exceptionCode != null) this.filters.exceptionCode.add(exceptionCode);
  }

  unmute({ unitId, funcCode, exceptionCode }: Partial<LogContext> = {}): void {
    if (unitId != null) this.filters.unitId.delete(unitId);
    if (funcCode != null) this.filters.funcCode.delete(funcCode);
    if (exceptionCode != null) this.filters.exceptionCode.delete(exceptionCode);
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

/**
 * Logger shared by the scanner engine. Quiet by default; raise it through
 * `ModbusScanner.enableLogger()` or directly.
 */
export const engineLogger = new Logger();
engineLogger.setLevel('error');

export default Logger;
