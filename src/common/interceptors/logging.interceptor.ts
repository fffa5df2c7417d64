import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request } from 'express';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Body keys never written to the log.
const REDACTED_KEYS = new Set(['password', 'passwordHash', 'temporaryPassword']);

export class Logger {
  private static logLevel: LogLevel = Logger.parseLevel(process.env.LOG_LEVEL);

  static parseLevel(raw: string | undefined): LogLevel {
    return raw === 'info' || raw === 'warn' || raw === 'error' ? raw : 'debug';
  }

  static setLevel(level: LogLevel) {
    this.logLevel = level;
  }

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.logLevel];
  }

  static log(message: string, context?: string) {
    if (this.enabled('info')) {
      console.log(`[LOG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static error(message: string, trace: string, context?: string) {
    console.error(`[ERROR] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    if (trace) {
      console.error(trace);
    }
  }

  static warn(message: string, context?: string) {
    if (this.enabled('warn')) {
      console.warn(`[WARN] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static debug(message: string, context?: string) {
    if (this.enabled('debug')) {
      console.debug(`[DEBUG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }
}

export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, v]) => [key, REDACTED_KEYS.has(key) ? '[redacted]' : redact(v)]),
    );
  }
  return value;
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, body, query } = request;

    Logger.debug(
      `Request: ${method} ${url} \nBody: ${JSON.stringify(redact(body))} \nQuery: ${JSON.stringify(query)}`,
      'LoggingInterceptor',
    );

    const now = Date.now();
    return next.handle().pipe(
      tap((response) => {
        Logger.debug(
          `Response: ${method} ${url} ${Date.now() - now}ms \nResponse: ${JSON.stringify(redact(response))}`,
          'LoggingInterceptor',
        );
      }),
    );
  }
}
