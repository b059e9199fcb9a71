import { DocumentParser } from '../../src/core/parser.js';
import { createHtmlRenderer } from '../../src/core/renderer.js';
import { createRoffRenderer } from '../../src/core/roff-renderer.js';
import type { DocumentRenderer } from '../../src/core/types.js';
import { ParseErrorCode } from '../../src/errors.js';
import type { ParseErrorCode as ParseErrorCodeType } from '../../src/errors.js';

/**
 * Helper: render markdown and collect the diagnostics it raised.
 */
function render(
  md: string,
  renderer: DocumentRenderer = createHtmlRenderer(0),
): { text: string; codes: ParseErrorCodeType[] } {
  const codes: ParseErrorCodeType[] = [];
  const parser = new DocumentParser(renderer, {
    feat: 0,
    maxNesting: 16,
    roffSafe: false,
    onError: (code) => codes.push(code),
  });
  try {
    return { text: parser.render(md).body.take().toString(), codes };
  } finally {
    parser.destroy();
    renderer.destroy();
  }
}

// ---------------------------------------------------------------------------
// Spaced links
// ---------------------------------------------------------------------------

describe('spaced links', () => {
  it('should render a spaced link as a link and report it', () => {
    expect(render('See [docs] (http://docs.test) now')).toEqual({
      text: '<p>See <a href="http://docs.test">docs</a> now</p>\n',
      codes: [ParseErrorCode.SpaceBeforeLink],
    });
  });

  it('should keep a link title', () => {
    expect(render('[a] (/x "Home")').text).toBe('<p><a href="/x" title="Home">a</a></p>\n');
  });

  it('should report every occurrence', () => {
    expect(render('[a] (/1) and [b]  (/2)').codes).toEqual([
      ParseErrorCode.SpaceBeforeLink,
      ParseErrorCode.SpaceBeforeLink,
    ]);
  });

  it('should render spaced links in roff output', () => {
    expect(render('see [a] (/b)', createRoffRenderer(0, true)).text).toBe(
      '.PP\nsee a \\(la/b\\(ra\n',
    );
  });

  it('should leave regular links alone', () => {
    expect(render('[a](b) [c]')).toEqual({
      text: '<p><a href="b">a</a> [c]</p>\n',
      codes: [],
    });
  });

  it('should leave an escaped bracket alone', () => {
    expect(render('\\[a] (b)')).toEqual({ text: '<p>[a] (b)</p>\n', codes: [] });
  });
});

// ---------------------------------------------------------------------------
// Code is never rewritten
// ---------------------------------------------------------------------------

describe('spaced links in code', () => {
  it('should not touch inline code', () => {
    expect(render('Use `[a] (b)` here')).toEqual({
      text: '<p>Use <code>[a] (b)</code> here</p>\n',
      codes: [],
    });
  });

  it('should not touch backtick fences', () => {
    expect(render('```\n[a] (b)\n```')).toEqual({
      text: '<pre><code>[a] (b)\n</code></pre>\n',
      codes: [],
    });
  });

  it('should not touch tilde fences', () => {
    expect(render('~~~\n[a] (b)\n~~~\n')).toEqual({
      text: '<pre><code>[a] (b)\n</code></pre>\n',
      codes: [],
    });
  });

  it('should not touch indented code blocks', () => {
    expect(render('para\n\n    see [a] (b)\n')).toEqual({
      text: '<p>para</p>\n<pre><code>see [a] (b)\n</code></pre>\n',
      codes: [],
    });
  });
});
