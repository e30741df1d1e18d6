import { readFile } from 'node:fs/promises';
import { configure, type Entry, TextWriter, Uint8ArrayReader, Uint8ArrayWriter, ZipReader } from '@zip.js/zip.js';
import type { Parser, ParserWarning } from '../parser';
import type { Book, ContentItem } from '../types';
import { classifyMediaType, findOpfPath, parseOpf, resolveItemPath } from './opf';

configure({ useWebWorkers: false });

const CONTAINER_PATH = 'META-INF/container.xml';

export class EpubParser implements Parser {
  async parse(path: string, onWarning?: ParserWarning): Promise<Book> {
    const file = await readFile(path);
    const zipReader = new ZipReader(new Uint8ArrayReader(new Uint8Array(file)));

    try {
      const entries: Entry[] = await zipReader.getEntries();

      const opfPath = findOpfPath(await extractText(entries, CONTAINER_PATH));
      const manifest = parseOpf(await extractText(entries, opfPath), opfPath);

      const items: ContentItem[] = [];
      for (const item of manifest.items) {
        const itemPath = resolveItemPath(manifest.baseDir, item.href);
        const entry = findEntry(entries, itemPath);
        if (!entry) {
          onWarning?.(`Manifest item ${item.id} points to a missing file: ${itemPath}`);
          continue;
        }

        items.push({
          id: item.id,
          href: item.href,
          mediaType: item.mediaType,
          type: classifyMediaType(item.mediaType),
          content: await extractBytes(entry),
        });
      }

      return { metadata: manifest.metadata, items };
    } finally {
      await zipReader.close();
    }
  }
}

function findEntry(entries: Entry[], filePath: string): Entry | undefined {
  return entries.find((entry) => entry.filename === filePath && !entry.directory);
}

async function extractText(entries: Entry[], filePath: string): Promise<string> {
  const entry = findEntry(entries, filePath);
  if (!entry) {
    throw new Error(`File not found in EPUB: ${filePath}`);
  }

  if (!entry.getData) {
    throw new Error(`Cannot read ${filePath} from EPUB`);
  }
  return await entry.getData(new TextWriter());
}

async function extractBytes(entry: Entry): Promise<Uint8Array> {
  if (!entry.getData) {
    throw new Error(`Cannot read ${entry.filename} from EPUB`);
  }
  return await entry.getData(new Uint8ArrayWriter());
}
