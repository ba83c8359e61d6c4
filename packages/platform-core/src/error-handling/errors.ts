import { getLogger } from '../logging/logger.js';

export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  CONFLICT = 'CONFLICT',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export class DomainError extends Error {
  public declare readonly cause?: Error;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, code: string = DomainErrorCode.UNKNOWN, details?: Record<string, unknown>, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ConfigurationError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(`Invalid configuration: ${message}`, DomainErrorCode.CONFIGURATION_ERROR, details, cause);
    this.name = 'ConfigurationError';
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(message: string, code: T, details?: Record<string, unknown>, cause?: Error, serviceName?: string) {
    super(message, code, details, cause);
    if (serviceName) this.name = `${serviceName}Error`;
  }
}

/**
 * Builds an error class for one service. The code table must contain the
 * generic DomainErrorCode members; INTERNAL_ERROR is the default code.
 */
export function createDomainServiceError<T extends string>(serviceName: string, domainErrorCodes: Record<string, T>) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, code?: T, details?: Record<string, unknown>, cause?: Error) {
      super(message, code ?? domainErrorCodes.INTERNAL_ERROR, details, cause, serviceName);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

export function wrapError(error: unknown, fallbackMessage = 'Unknown error'): DomainError {
  if (error instanceof DomainError) return error;
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : DomainErrorCode.UNKNOWN;
    return new DomainError(error.message, code, undefined, error);
  }
  return new DomainError(String(error ?? '') || fallbackMessage, DomainErrorCode.UNKNOWN);
}

export function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof DomainError && error.code === code;
}

const FATAL_REJECTION_CODES = new Set(['ENOMEM', 'ERR_OUT_OF_MEMORY', 'ERR_WORKER_INIT_FAILED']);
const FATAL_REJECTION_NAMES = new Set(['RangeError']);
const FATAL_REJECTION_MESSAGES = ['maximum call stack size exceeded', 'out of memory', 'heap out of memory'];

export function isFatalRejection(reason: unknown): boolean {
  if (!(reason instanceof Error)) return false;
  if (FATAL_REJECTION_NAMES.has(reason.name)) return true;
  if ('code' in reason && typeof reason.code === 'string' && FATAL_REJECTION_CODES.has(reason.code)) return true;
  const msg = reason.message.toLowerCase();
  return FATAL_REJECTION_MESSAGES.some(m => msg.includes(m));
}

type HandlerType = 'uncaughtException' | 'unhandledRejection' | 'SIGINT' | 'SIGTERM';

interface ErrorHandlerInfo {
  source: string;
  timestamp: Date;
  handlerType: HandlerType;
}

export class ErrorHandlerManager {
  private static instance: ErrorHandlerManager;
  private logger = getLogger('error-handler-manager');
  private registeredHandlers = new Map<HandlerType, ErrorHandlerInfo>();
  private isInitialized = false;
  private shutdownHooks: Array<() => Promise<void>> = [];

  private constructor() {}

  public static getInstance(): ErrorHandlerManager {
    if (!ErrorHandlerManager.instance) {
      ErrorHandlerManager.instance = new ErrorHandlerManager();
    }
    return ErrorHandlerManager.instance;
  }

  public registerGlobalHandlers(source: string): void {
    if (this.isInitialized) {
      this.logger.debug(`Global error handlers already registered, ignoring duplicate call from: ${source}`, {
        source,
        existingHandlers: Array.from(this.registeredHandlers.keys()),
      });
      return;
    }

    process.on('uncaughtException', (error: Error) => {
      this.logger.error('Uncaught Exception', {
        error: error.message,
        stack: error.stack,
        source: 'global-handler',
      });
      process.exit(1);
    });
    this.track('uncaughtException', source);

    process.on('unhandledRejection', (reason: unknown) => {
      const isFatal = isFatalRejection(reason);
      this.logger.error('Unhandled Promise Rejection', {
        reason: errorMessage(reason ?? 'Unknown reason'),
        stack: errorStack(reason) ?? 'No stack trace',
        source: 'global-handler',
        fatal: isFatal,
      });
      if (isFatal) {
        process.exit(1);
      }
    });
    this.track('unhandledRejection', source);

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.on(signal, () => {
        this.logger.info(`Received ${signal} - initiating graceful shutdown`);
        this.gracefulShutdown(signal);
      });
      this.track(signal, source);
    }

    this.isInitialized = true;
    this.logger.debug('Global error handlers registered', { source, handlersCount: this.registeredHandlers.size });
  }

  public registerShutdownHook(hook: () => Promise<void>): void {
    this.shutdownHooks.push(hook);
  }

  /**
   * Runs every shutdown hook in registration order. A failing hook is logged
   * and does not stop the ones after it.
   */
  public async runShutdownHooks(): Promise<void> {
    for (const hook of this.shutdownHooks) {
      try {
        await hook();
      } catch (error) {
        this.logger.error('Shutdown hook error', { error: errorMessage(error) });
      }
    }
  }

  private track(handlerType: HandlerType, source: string): void {
    this.registeredHandlers.set(handlerType, { source, timestamp: new Date(), handlerType });
  }

  private gracefulShutdown(signal: string): void {
    this.logger.info(`Starting graceful shutdown (${signal})...`);

    const forceExitTimeout = setTimeout(() => {
      this.logger.warn('Shutdown hooks timed out, forcing exit');
      process.exit(1);
    }, 10000);
    forceExitTimeout.unref();

    this.runShutdownHooks()
      .then(() => {
        this.logger.info('Graceful shutdown completed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        this.logger.error('Graceful shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  }
}

export function registerGlobalErrorHandlers(source: string): void {
  ErrorHandlerManager.getInstance().registerGlobalHandlers(source);
}

export function registerShutdownHook(hook: () => Promise<void>): void {
  ErrorHandlerManager.getInstance().registerShutdownHook(hook);
}
