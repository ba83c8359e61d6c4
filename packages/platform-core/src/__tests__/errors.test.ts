import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DomainError,
  DomainErrorCode,
  ErrorHandlerManager,
  createDomainServiceError,
  errorMessage,
  isErrorCode,
  isFatalRejection,
  wrapError,
} from '../error-handling/errors';

const WidgetErrorCode = { ...DomainErrorCode, WIDGET_JAMMED: 'WIDGET_JAMMED' } as const;
const WidgetError = createDomainServiceError('Widget', WidgetErrorCode);

describe('DomainError', () => {
  it('should default to the UNKNOWN code', () => {
    const error = new DomainError('boom');

    expect(error.code).toBe(DomainErrorCode.UNKNOWN);
    expect(error.name).toBe('DomainError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should keep code, details and cause', () => {
    const cause = new Error('root cause');
    const error = new DomainError('boom', DomainErrorCode.CONFLICT, { id: 'w-1' }, cause);

    expect(error.code).toBe('CONFLICT');
    expect(error.details).toEqual({ id: 'w-1' });
    expect(error.cause).toBe(cause);
    expect(error.timestamp).toBeInstanceOf(Date);
  });
});

describe('ConfigurationError', () => {
  it('should prefix the message and use the configuration code', () => {
    const error = new ConfigurationError('LOG_LEVEL');

    expect(error.message).toBe('Invalid configuration: LOG_LEVEL');
    expect(error.code).toBe(DomainErrorCode.CONFIGURATION_ERROR);
    expect(error.name).toBe('ConfigurationError');
  });
});

describe('createDomainServiceError', () => {
  it('should name errors after the service', () => {
    const error = new WidgetError('jammed', WidgetErrorCode.WIDGET_JAMMED);

    expect(error.name).toBe('WidgetError');
    expect(error.code).toBe('WIDGET_JAMMED');
    expect(error).toBeInstanceOf(DomainError);
  });

  it('should fall back to INTERNAL_ERROR when no code is given', () => {
    expect(new WidgetError('oops').code).toBe(DomainErrorCode.INTERNAL_ERROR);
  });
});

describe('error helpers', () => {
  it('should extract messages from any thrown value', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage('b')).toBe('b');
    expect(errorMessage(42)).toBe('42');
  });

  it('should return DomainErrors unchanged from wrapError', () => {
    const error = new DomainError('kept');
    expect(wrapError(error)).toBe(error);
  });

  it('should wrap plain errors and keep them as the cause', () => {
    const original = new Error('plain');
    const wrapped = wrapError(original);

    expect(wrapped).toBeInstanceOf(DomainError);
    expect(wrapped.message).toBe('plain');
    expect(wrapped.code).toBe(DomainErrorCode.UNKNOWN);
    expect(wrapped.cause).toBe(original);
  });

  it('should use the fallback message for empty values', () => {
    expect(wrapError(undefined).message).toBe('Unknown error');
    expect(wrapError('text').message).toBe('text');
  });

  it('should match error codes only on DomainErrors', () => {
    expect(isErrorCode(new DomainError('x', DomainErrorCode.NOT_FOUND), DomainErrorCode.NOT_FOUND)).toBe(true);
    expect(isErrorCode(new DomainError('x', DomainErrorCode.CONFLICT), DomainErrorCode.NOT_FOUND)).toBe(false);
    expect(isErrorCode(Object.assign(new Error('x'), { code: 'NOT_FOUND' }), DomainErrorCode.NOT_FOUND)).toBe(false);
  });

  it('should classify fatal rejections', () => {
    expect(isFatalRejection(new RangeError('too deep'))).toBe(true);
    expect(isFatalRejection(Object.assign(new Error('alloc'), { code: 'ENOMEM' }))).toBe(true);
    expect(isFatalRejection(new Error('JavaScript heap out of memory'))).toBe(true);
    expect(isFatalRejection(new Error('timeout'))).toBe(false);
    expect(isFatalRejection('out of memory')).toBe(false);
  });
});

describe('ErrorHandlerManager', () => {
  it('should run every shutdown hook even when one fails', async () => {
    const manager = ErrorHandlerManager.getInstance();
    const calls: string[] = [];

    manager.registerShutdownHook(async () => {
      calls.push('first');
      throw new Error('hook failed');
    });
    manager.registerShutdownHook(async () => {
      calls.push('second');
    });

    await manager.runShutdownHooks();

    expect(calls).toEqual(['first', 'second']);
  });

  it('should return the same instance every time', () => {
    expect(ErrorHandlerManager.getInstance()).toBe(ErrorHandlerManager.getInstance());
  });
});
