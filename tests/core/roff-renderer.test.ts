import { Features, OutputFlags } from '../../src/config.js';
import { DocumentParser } from '../../src/core/parser.js';
import { createRoffRenderer, escapeRoffText } from '../../src/core/roff-renderer.js';

/**
 * Helper: render markdown through a fresh roff renderer.
 */
function render(md: string, isMan = true, feat = 0, oflags = 0): string {
  const renderer = createRoffRenderer(oflags, isMan);
  const parser = new DocumentParser(renderer, { feat, maxNesting: 16, roffSafe: true });
  try {
    return parser.render(md).body.take().toString();
  } finally {
    parser.destroy();
    renderer.destroy();
  }
}

describe('escapeRoffText', () => {
  it('escapes backslashes', () => {
    expect(escapeRoffText('a\\b')).toBe('a\\eb');
  });

  it('protects a leading dot or apostrophe on every line', () => {
    expect(escapeRoffText(".x\n'y\nz.")).toBe("\\&.x\n\\&'y\nz.");
  });
});

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

describe('roff renderer - blocks', () => {
  it('renders paragraphs with .PP', () => {
    expect(render('Hello world')).toBe('.PP\nHello world\n');
  });

  it('renders top-level headings with .SH', () => {
    expect(render('# NAME')).toBe('.SH\nNAME\n');
  });

  it('renders man subheadings with .SS', () => {
    expect(render('## Options')).toBe('.SS\nOptions\n');
  });

  it('renders ms subheadings with .SH', () => {
    expect(render('## Options', false)).toBe('.SH\nOptions\n');
  });

  it('renders man code displays', () => {
    expect(render('```\n.ls\n```')).toBe('.PP\n.nf\n.ft CW\n\\&.ls\n.ft\n.fi\n');
  });

  it('renders ms code displays', () => {
    expect(render('```\n.ls\n```', false)).toBe('.DS\n.nf\n.ft CW\n\\&.ls\n.ft\n.fi\n.DE\n');
  });

  it('indents block quotes', () => {
    expect(render('> quoted')).toBe('.RS\n.PP\nquoted\n.RE\n');
  });

  it('renders bullet lists', () => {
    expect(render('- one\n- two')).toBe('.IP \\(bu\none\n.IP \\(bu\ntwo\n');
  });

  it('renders ordered lists from their start number', () => {
    expect(render('3. a\n4. b')).toBe('.IP 3.\na\n.IP 4.\nb\n');
  });

  it('renders hr as vertical space', () => {
    expect(render('---')).toBe('.sp\n');
  });

  it('renders tables with tbl', () => {
    expect(render('| a | b |\n|:--|--:|\n| 1 | 2 |', true, Features.Tables)).toBe(
      '.TS\ntab(|);\nl r.\na|b\n_\n1|2\n.TE\n',
    );
  });
});

// ---------------------------------------------------------------------------
// Inline
// ---------------------------------------------------------------------------

describe('roff renderer - inline', () => {
  it('renders strong and emphasis as font changes', () => {
    expect(render('**b** and *i*')).toBe('.PP\n\\fBb\\fP and \\fIi\\fP\n');
  });

  it('renders code spans in constant width', () => {
    expect(render('`x.y`')).toBe('.PP\n\\f(CWx.y\\fP\n');
  });

  it('renders links as text followed by the URL', () => {
    expect(render('[docs](http://x.test)')).toBe('.PP\ndocs \\(lahttp://x.test\\(ra\n');
  });

  it('renders autolinks as the URL alone', () => {
    expect(render('<http://x.test>')).toBe('.PP\n\\(lahttp://x.test\\(ra\n');
  });

  it('renders images as their alt text', () => {
    expect(render('![a picture](/p.png)')).toBe('.PP\na picture\n');
  });

  it('renders hard breaks with .br', () => {
    expect(render('a\nb', true, 0, OutputFlags.HardWrap)).toBe('.PP\na\n.br\nb\n');
  });

  it('escapes backslashes in text', () => {
    expect(render('a\\b')).toBe('.PP\na\\eb\n');
  });

  it('protects a line that starts with a dot', () => {
    expect(render('x\n.y')).toBe('.PP\nx\n\\&.y\n');
  });

  it('drops raw HTML', () => {
    expect(render('a <b>x</b> c')).toBe('.PP\na x c\n');
  });
});

describe('roff renderer - lifetime', () => {
  it('reports its kind', () => {
    const renderer = createRoffRenderer(0, false);
    expect(renderer.kind).toBe('roff');
    renderer.destroy();
  });
});
