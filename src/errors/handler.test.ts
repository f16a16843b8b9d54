import { handleError, mapSystemError, toAppError } from './handler';
import { AppError, ErrorCode } from './types';

function errnoError(code: string, path?: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: failure`);
  error.code = code;
  error.path = path;
  error.syscall = 'open';
  return error;
}

describe('mapSystemError', () => {
  it('maps ENOENT to FILE_NOT_FOUND', () => {
    const err = mapSystemError(errnoError('ENOENT', '/home/test/.netrc'));
    expect(err.code).toBe(ErrorCode.FILE_NOT_FOUND);
    expect(err.details).toEqual({ path: '/home/test/.netrc', syscall: 'open' });
  });

  it('maps EACCES and EPERM to PERMISSION_DENIED', () => {
    expect(mapSystemError(errnoError('EACCES')).code).toBe(ErrorCode.PERMISSION_DENIED);
    expect(mapSystemError(errnoError('EPERM')).code).toBe(ErrorCode.PERMISSION_DENIED);
  });

  it('maps EISDIR to NOT_A_FILE', () => {
    expect(mapSystemError(errnoError('EISDIR')).code).toBe(ErrorCode.NOT_A_FILE);
  });

  it('maps other codes to UNKNOWN_ERROR', () => {
    const err = mapSystemError(errnoError('EMFILE'));
    expect(err.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(err.details).toEqual({ originalCode: 'EMFILE', syscall: 'open' });
  });
});

describe('toAppError', () => {
  it('returns AppError instances unchanged', () => {
    const original = new AppError('x', ErrorCode.INVALID_TARGET);
    expect(toAppError(original)).toBe(original);
  });

  it('maps system errors', () => {
    expect(toAppError(errnoError('ENOENT')).code).toBe(ErrorCode.FILE_NOT_FOUND);
  });

  it('wraps generic errors', () => {
    const err = toAppError(new TypeError('bad'));
    expect(err.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(err.message).toBe('bad');
    expect(err.details).toEqual({ originalError: 'TypeError' });
  });

  it('wraps non-error values', () => {
    expect(toAppError('boom').message).toBe('boom');
  });
});

describe('handleError', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prints the user message and suggestion', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => {});
    handleError(new AppError('x', ErrorCode.NO_CREDENTIAL_FOUND, { target: 'foo.com' }));

    expect(spy.mock.calls[0]?.[1]).toBe('No credentials found for foo.com');
    expect(spy.mock.calls[1]?.[1]).toBe('Add an entry for the host to ~/.git-credentials or ~/.netrc');
  });

  it('prints the error code in debug mode', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => {});
    handleError(new AppError('x', ErrorCode.INVALID_TARGET), true);

    const codeLine = spy.mock.calls.find((call) => String(call[0]).includes('Error Code:'));
    expect(codeLine?.[1]).toBe(ErrorCode.INVALID_TARGET);
  });
});
