import vm from 'vm';
import { z } from 'zod';
import { ADBNotFoundError, InvalidPortError, SessionStartError } from '../../src/types';
import { errorCode, errorMessage, formatErrorForResponse, getErrorSuggestion } from '../../src/utils/error';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from '../../src/utils/logger';

describe('Logger', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    setLogLevel('silent');
  });

  it('should write scoped lines at or above the active level', () => {
    setLogLevel('info');
    const logger = createLogger('engine').child('wait');

    logger.debug('hidden');
    logger.info('Wait condition met', { polls: 2 });

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(consoleSpy.mock.calls[0][0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\S+Z INFO  \[engine:wait\] Wait condition met \{"polls":2\}$/
    );
  });

  it('should fold the error message into error lines', () => {
    setLogLevel('error');

    createLogger('http').error('Request failed', new Error('socket hang up'), { path: '/ui/dump' });

    expect(consoleSpy.mock.calls[0][0]).toMatch(
      /ERROR \[http\] Request failed \{"error":"socket hang up","path":"\/ui\/dump"\}$/
    );
  });

  it('should fold messages of errors from another realm', () => {
    setLogLevel('error');
    const foreign: unknown = vm.runInNewContext('new Error("socket hang up")');

    createLogger('http').error('Request failed', foreign);

    expect(consoleSpy.mock.calls[0][0]).toMatch(/ERROR \[http\] Request failed \{"error":"socket hang up"\}$/);
  });

  it('should write nothing when silent', () => {
    setLogLevel('silent');

    createLogger('x').error('nope');

    expect(consoleSpy).not.toHaveBeenCalled();
    expect(getLogLevel()).toBe('silent');
  });

  it('should recognise level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});

describe('Error formatting', () => {
  it('should render code, message and suggestion for typed errors', () => {
    expect(formatErrorForResponse(new ADBNotFoundError())).toBe(
      'ADB_NOT_FOUND: Android Debug Bridge (ADB) not found\n\n' +
        'Suggestion: Please install Android SDK Platform Tools and ensure ADB is in your PATH'
    );
    expect(formatErrorForResponse(new InvalidPortError(80))).toBe(
      'INVALID_PORT: Port 80 is outside the allowed range 1024-65535\n\nSuggestion: Choose a port between 1024 and 65535'
    );
  });

  it('should list schema issues with their paths', () => {
    const schema = z.object({ selector: z.object({ index: z.number() }) });
    const result = schema.safeParse({ selector: { index: 'first' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatErrorForResponse(result.error)).toBe('selector.index: Expected number, received string');
    }
  });

  it('should fall back to the message or the value', () => {
    expect(formatErrorForResponse(new Error('plain'))).toBe('plain');
    expect(formatErrorForResponse('text')).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });

  it('should read errors created in another realm', () => {
    const foreign: unknown = vm.runInNewContext(
      'Object.assign(new Error("listen EADDRINUSE: address already in use"), { code: "EADDRINUSE" })'
    );

    expect(foreign instanceof Error).toBe(false);
    expect(errorCode(foreign)).toBe('EADDRINUSE');
    expect(formatErrorForResponse(foreign)).toBe('listen EADDRINUSE: address already in use');
    expect(errorMessage(foreign)).toBe('listen EADDRINUSE: address already in use');
    expect(errorCode('EADDRINUSE')).toBeUndefined();
  });

  it('should expose suggestions when present', () => {
    expect(getErrorSuggestion(new SessionStartError(8080, 'listen EADDRINUSE', 'Pick another port'))).toBe(
      'Pick another port'
    );
    expect(getErrorSuggestion(new Error('plain'))).toBeUndefined();
  });
});
