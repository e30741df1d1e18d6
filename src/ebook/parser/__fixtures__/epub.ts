import { configure, TextReader, Uint8ArrayWriter, ZipWriter } from '@zip.js/zip.js';

configure({ useWebWorkers: false });

export interface FixtureItem {
  id: string;
  href: string;
  mediaType?: string;
  /** Archive entry name under OEBPS/, when it differs from the href. */
  path?: string;
  /** Left out of the archive when undefined. */
  content?: string;
}

const CONTAINER = `<?xml version='1.0' encoding='UTF-8'?>
<container version='1.0' xmlns='urn:oasis:names:tc:opendocument:xmlns:container'>
  <rootfiles>
    <rootfile full-path='OEBPS/content.opf' media-type='application/oebps-package+xml'/>
  </rootfiles>
</container>`;

/** Zips a minimal EPUB. Entries are written in reverse manifest order. */
export async function buildEpub(items: FixtureItem[], title = 'Fixture', creator = 'Test Author'): Promise<Uint8Array> {
  const manifest = items
    .map((item) => `<item id="${item.id}" href="${item.href}" media-type="${item.mediaType ?? 'application/xhtml+xml'}"/>`)
    .join('\n    ');
  const opf = `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:title>${title}</dc:title>
    <dc:creator>${creator}</dc:creator>
  </metadata>
  <manifest>
    ${manifest}
  </manifest>
</package>`;

  const zip = new ZipWriter(new Uint8ArrayWriter());
  await zip.add('mimetype', new TextReader('application/epub+zip'));
  await zip.add('META-INF/container.xml', new TextReader(CONTAINER));
  await zip.add('OEBPS/content.opf', new TextReader(opf));
  for (const item of [...items].reverse()) {
    if (item.content !== undefined) {
      await zip.add(`OEBPS/${item.path ?? item.href}`, new TextReader(item.content));
    }
  }
  return zip.close();
}
