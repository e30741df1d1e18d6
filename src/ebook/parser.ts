import type { Book } from './types';
import { EpubParser } from './parser/epub';

export type ParserWarning = (message: string) => void;

export interface Parser {
  parse(path: string, onWarning?: ParserWarning): Promise<Book>;
}

/** Every input is read as an EPUB whatever its file name; the archive decides whether it is one. */
export function buildParser(): Parser {
  return new EpubParser();
}
