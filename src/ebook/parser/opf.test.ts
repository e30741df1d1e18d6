import { classifyMediaType, findOpfPath, getBaseDir, parseOpf, resolveItemPath } from './opf';

const CONTAINER = `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`;

const OPF = `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:title id="t1">Tom &amp; Jerry</dc:title>
    <dc:creator id="c1">First Author</dc:creator>
    <dc:creator id="c2">Second Author</dc:creator>
    <dc:creator id="c3">   </dc:creator>
  </metadata>
  <manifest>
    <item id="cover" href="images/cover.jpg" media-type="image/jpeg"/>
    <item href="text/ch%201.xhtml" id="ch1" media-type="application/xhtml+xml"/>
    <item id="css" href="style.css" media-type="text/css"/>
    <item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>
  </manifest>
  <spine toc="ncx">
    <itemref idref="ch1"/>
  </spine>
</package>`;

describe('findOpfPath', () => {
  it('reads the package document path from the container', () => {
    expect(findOpfPath(CONTAINER)).toBe('OEBPS/content.opf');
  });

  it('accepts single-quoted attributes', () => {
    const container = "<container><rootfiles><rootfile full-path='OPS/package.opf' media-type='application/oebps-package+xml'/></rootfiles></container>";

    expect(findOpfPath(container)).toBe('OPS/package.opf');
  });

  it('fails when the container names no package document', () => {
    expect(() => findOpfPath('<container/>')).toThrow('Invalid EPUB: Cannot find OPF file path');
  });
});

describe('parseOpf', () => {
  const manifest = parseOpf(OPF, 'OEBPS/content.opf');

  it('collects every title and creator in document order', () => {
    expect(manifest.metadata).toEqual({ titles: ['Tom & Jerry'], creators: ['First Author', 'Second Author', '   '] });
  });

  it('keeps manifest order whatever the attribute order', () => {
    expect(manifest.items).toEqual([
      { id: 'cover', href: 'images/cover.jpg', mediaType: 'image/jpeg' },
      { id: 'ch1', href: 'text/ch%201.xhtml', mediaType: 'application/xhtml+xml' },
      { id: 'css', href: 'style.css', mediaType: 'text/css' },
      { id: 'ncx', href: 'toc.ncx', mediaType: 'application/x-dtbncx+xml' },
    ]);
  });

  it('reads single-quoted manifest items', () => {
    const opf = `<package><metadata xmlns:dc='http://purl.org/dc/elements/1.1/'><dc:title>Short</dc:title></metadata>
      <manifest><item id='c1' href='c1.xhtml' media-type='application/xhtml+xml'/></manifest></package>`;

    expect(parseOpf(opf, 'content.opf').items).toEqual([{ id: 'c1', href: 'c1.xhtml', mediaType: 'application/xhtml+xml' }]);
  });

  it('ignores items outside the manifest', () => {
    const opf = `<package><manifest><item id="c1" href="c1.xhtml" media-type="text/html"/></manifest>
      <guide><item id="stray" href="stray.xhtml"/></guide></package>`;

    expect(parseOpf(opf, 'content.opf').items.map((item) => item.id)).toEqual(['c1']);
  });

  it('resolves hrefs against the package document directory', () => {
    expect(manifest.baseDir).toBe('OEBPS/');
  });
});

describe('getBaseDir', () => {
  it('is empty for a package document at the archive root', () => {
    expect(getBaseDir('content.opf')).toBe('');
  });
});

describe('resolveItemPath', () => {
  it('decodes percent-encoded hrefs', () => {
    expect(resolveItemPath('OEBPS/', 'text/ch%201.xhtml')).toBe('OEBPS/text/ch 1.xhtml');
  });

  it('normalizes parent segments', () => {
    expect(resolveItemPath('OEBPS/', '../Images/a.jpg')).toBe('Images/a.jpg');
  });

  it('keeps hrefs that are not valid percent-encoding', () => {
    expect(resolveItemPath('', '100%.xhtml')).toBe('100%.xhtml');
  });
});

describe('classifyMediaType', () => {
  it.each([
    ['application/xhtml+xml', 'document'],
    ['text/html', 'document'],
    ['application/x-dtbncx+xml', 'navigation'],
    ['text/css', 'style'],
    ['image/svg+xml', 'image'],
    ['font/woff2', 'font'],
    ['application/vnd.ms-opentype', 'font'],
    ['application/smil+xml', 'other'],
  ])('classifies %s as %s', (mediaType, expected) => {
    expect(classifyMediaType(mediaType)).toBe(expected);
  });
});
