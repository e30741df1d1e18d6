import { access } from 'node:fs/promises';
import { DocumentParseError, InputNotFoundError } from '../errors';
import { buildParser, type Parser, type ParserWarning } from './parser';
import { isChapterText, normalizeText } from './text';
import type { Book, Chapter } from './types';

export type ParserFactory = (path: string) => Parser;

export async function open(
  inputFile: string,
  parserFor: ParserFactory = buildParser,
  onWarning?: ParserWarning,
): Promise<Book> {
  try {
    await access(inputFile);
  } catch {
    throw new InputNotFoundError(inputFile);
  }

  try {
    return await parserFor(inputFile).parse(inputFile, onWarning);
  } catch (error) {
    throw new DocumentParseError(inputFile, error);
  }
}

/**
 * Numbers the document items that carry enough text to narrate. Items of other
 * types and items under the length threshold are skipped without consuming a
 * chapter number.
 */
export function extractChapters(book: Book): Chapter[] {
  const chapters: Chapter[] = [];

  for (const item of book.items) {
    if (item.type !== 'document') continue;

    const text = normalizeText(item.content);
    if (!isChapterText(text)) continue;

    chapters.push({ index: chapters.length + 1, text });
  }

  return chapters;
}
