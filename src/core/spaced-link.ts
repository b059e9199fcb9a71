/**
 * Inline `marked` extension for links written with whitespace between the
 * text and the destination: `[text] (url)`.
 *
 * The link is still rendered as a link, and each one is reported. It runs
 * as an inline tokenizer, so code spans and code blocks never reach it.
 *
 * @module core/spaced-link
 */
import type { TokenizerExtension } from 'marked';

/** `[text] (url "title")`, anchored at the tokenizer position. */
const SPACED_LINK_RE = /^\[([^\]\n]*)\][ \t]+\(([^)\s]*)(?:\s+"([^"\n]*)")?\)/;

/**
 * Build the extension.
 *
 * @param onSpacedLink - Called once per spaced link, in document order.
 */
export function spacedLinkExtension(onSpacedLink: () => void): TokenizerExtension {
  return {
    name: 'spacedLink',
    level: 'inline',
    start(src: string): number | undefined {
      const index = src.indexOf('[');
      return index < 0 ? undefined : index;
    },
    tokenizer(src) {
      if (this.lexer.state.inLink) {
        return undefined;
      }
      const match = SPACED_LINK_RE.exec(src);
      if (!match) {
        return undefined;
      }

      onSpacedLink();
      const [raw, text, href, title] = match;
      return {
        type: 'link',
        raw,
        href,
        title: title ?? null,
        text,
        tokens: this.lexer.inlineTokens(text),
      };
    },
  };
}
