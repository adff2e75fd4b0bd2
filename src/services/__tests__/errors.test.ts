import { describe, expect, it } from 'vitest';
import { executeWithErrorHandling, getErrorMessage, isTimeoutError, ToolError } from '../errors.js';

describe('executeWithErrorHandling', () => {
  it('returns the operation result', async () => {
    await expect(executeWithErrorHandling(async () => 42, 'Lookup failed')).resolves.toBe(42);
  });

  it('prefixes the context and keeps the cause', async () => {
    const cause = new Error('socket hang up');
    const error = await executeWithErrorHandling(async () => {
      throw cause;
    }, 'Query failed').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ message: 'Query failed: socket hang up', cause });
  });

  it('keeps the kind of tool errors', async () => {
    const error = await executeWithErrorHandling(async () => {
      throw new ToolError('UnknownProfile', 'no such profile', { available: [] });
    }, 'Switch failed').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ToolError);
    expect(error).toMatchObject({ kind: 'UnknownProfile', message: 'Switch failed: no such profile' });
  });
});

describe('isTimeoutError', () => {
  it('finds driver timeouts through wrapped causes', () => {
    const driverError = Object.assign(new Error('Timeout'), { code: 'ETIMEOUT' });
    expect(isTimeoutError(new Error('Query failed: Timeout', { cause: driverError }))).toBe(true);
  });

  it('treats requests the driver cancelled as timeouts', () => {
    const cancelled = Object.assign(new Error('Canceled.'), { name: 'RequestError', code: 'ECANCEL' });
    expect(isTimeoutError(cancelled)).toBe(true);
  });

  it('recognises aborts', () => {
    const controller = new AbortController();
    controller.abort();
    expect(isTimeoutError(controller.signal.reason)).toBe(true);
  });

  it('ignores other failures', () => {
    expect(isTimeoutError(new Error('Login failed'))).toBe(false);
    expect(isTimeoutError('ETIMEOUT')).toBe(false);
  });
});

describe('getErrorMessage', () => {
  it('handles non-Error values', () => {
    expect(getErrorMessage('plain text')).toBe('plain text');
    expect(getErrorMessage({ code: 1 })).toBe('Unknown error');
  });
});
