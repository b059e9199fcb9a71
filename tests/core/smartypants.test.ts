import {
  smartypantsHtml,
  smartypantsRoff,
  substituteHtml,
  substituteRoff,
} from '../../src/core/smartypants.js';

// ---------------------------------------------------------------------------
// HTML
// ---------------------------------------------------------------------------

describe('smartypantsHtml', () => {
  it('substitutes quotes, dashes and ellipses', () => {
    expect(smartypantsHtml('<p>&quot;Hi&quot; -- it&#39;s...</p>')).toBe(
      '<p>&ldquo;Hi&rdquo; &ndash; it&rsquo;s&hellip;</p>',
    );
  });

  it('handles literal quote characters', () => {
    expect(smartypantsHtml(`<p>"a" and 'b'</p>`)).toBe(
      '<p>&ldquo;a&rdquo; and &lsquo;b&rsquo;</p>',
    );
  });

  it('turns three hyphens into an em dash', () => {
    expect(smartypantsHtml('a---b')).toBe('a&mdash;b');
  });

  it('leaves code contents alone', () => {
    expect(smartypantsHtml('<p>"a" <code>"b"</code> "c"</p>')).toBe(
      '<p>&ldquo;a&rdquo; <code>"b"</code> &ldquo;c&rdquo;</p>',
    );
  });

  it('leaves pre blocks alone', () => {
    const html = '<pre><code>x -- y...</code></pre>\n';
    expect(smartypantsHtml(html)).toBe(html);
  });

  it('leaves attributes inside tags alone', () => {
    expect(smartypantsHtml('<a title="x--y">z</a>')).toBe('<a title="x--y">z</a>');
  });

  it('keeps other entities', () => {
    expect(smartypantsHtml('&amp;&quot;x&quot;')).toBe('&amp;&rdquo;x&rdquo;');
  });

  it('closes a quote that follows an inline closing tag', () => {
    expect(smartypantsHtml('<em>word</em>"')).toBe('<em>word</em>&rdquo;');
  });
});

// ---------------------------------------------------------------------------
// roff
// ---------------------------------------------------------------------------

describe('smartypantsRoff', () => {
  it('substitutes text lines and skips requests', () => {
    expect(smartypantsRoff('.SH\n"Name" -- it\'s...\n')).toBe(
      '.SH\n\\(lqName\\(rq \\(en it\\(cqs\\&.\\|.\\|.\n',
    );
  });

  it('leaves no-fill regions alone', () => {
    const roff = '.nf\n"raw" -- x\n.fi\n';
    expect(smartypantsRoff(roff)).toBe(roff);
  });

  it('resumes after a no-fill region', () => {
    expect(smartypantsRoff('.nf\n"a"\n.fi\n"b"')).toBe('.nf\n"a"\n.fi\n\\(lqb\\(rq');
  });

  it('steps over escape sequences', () => {
    expect(smartypantsRoff('\\fB"x"\\fP')).toBe('\\fB\\(lqx\\(rq\\fP');
  });

  it('does not touch the hyphen in \\(em', () => {
    expect(smartypantsRoff('a \\(em b')).toBe('a \\(em b');
  });
});

// ---------------------------------------------------------------------------
// Byte passes
// ---------------------------------------------------------------------------

describe('substitute passes', () => {
  it('substituteHtml returns a fresh buffer', () => {
    const input = Buffer.from('<p>"x"</p>\n');
    const output = substituteHtml(input);
    expect(output.toString()).toBe('<p>&ldquo;x&rdquo;</p>\n');
    expect(input.toString()).toBe('<p>"x"</p>\n');
  });

  it('substituteRoff decodes and re-encodes UTF-8', () => {
    expect(substituteRoff(Buffer.from('"Grüße"')).toString()).toBe('\\(lqGrüße\\(rq');
  });
});
