import {
  InputReadError,
  Md2OutError,
  ParseErrorCode,
  errorMessage,
} from '../src/errors.js';

describe('errorMessage', () => {
  it('should describe a space before a link', () => {
    expect(errorMessage(ParseErrorCode.SpaceBeforeLink)).toBe(
      'space before link (CommonMark violation)',
    );
  });

  it('should describe a bad metadata key character', () => {
    expect(errorMessage(ParseErrorCode.MetadataKeyChar)).toBe(
      'bad character in metadata key (MultiMarkdown violation)',
    );
  });

  it.each([-1, 2, 1.5, Number.NaN])('should throw a RangeError for %p', (code) => {
    expect(() => errorMessage(code)).toThrow(`Unknown parse error code: ${String(code)}`);
  });
});

describe('InputReadError', () => {
  it('should wrap an Error cause', () => {
    const cause = new Error('gone');
    const err = new InputReadError(cause);
    expect(err).toBeInstanceOf(Md2OutError);
    expect(err.name).toBe('InputReadError');
    expect(err.code).toBe('INPUT_READ');
    expect(err.message).toBe('Failed to read input: gone');
    expect(err.cause).toBe(cause);
  });

  it('should stringify a non-Error cause', () => {
    expect(new InputReadError('EOF').message).toBe('Failed to read input: EOF');
  });
});
