import * as cheerio from 'cheerio';

/** Shorter units are cover pages, copyright stubs and other boilerplate. */
export const MIN_CHAPTER_LENGTH = 100;

const decoder = new TextDecoder('utf-8');

/**
 * Reduces a markup document to the plain text a narrator should read.
 *
 * Script and style content is dropped and every element boundary becomes a
 * space, so `<p>end</p><p>start</p>` never fuses into one word. Whitespace is
 * collapsed and the result trimmed. Malformed markup degrades to a tag-stripping
 * pass instead of throwing.
 */
export function normalizeText(content: Uint8Array | string): string {
  const markup = typeof content === 'string' ? content : decoder.decode(content);

  try {
    // XHTML writes empty elements as `<script src="a.js"/>` and `<title/>`
    const $ = cheerio.load(markup, { xml: { xmlMode: false, recognizeSelfClosing: true } });
    $('script, style').remove();
    $('*').each((_, element) => {
      $(element).before(' ').after(' ');
    });

    return collapseWhitespace($.root().text());
  } catch {
    return collapseWhitespace(stripTags(markup));
  }
}

export function isChapterText(text: string): boolean {
  return text.length >= MIN_CHAPTER_LENGTH;
}

function stripTags(markup: string): string {
  return markup
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<[^>]*>/g, ' ');
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/gu, ' ').trim();
}
