import type { AudioFormat } from '../audio/formats';
import type { BookIdentity } from '../ebook/types';
import { TemplateConfigError } from '../errors';

export const DEFAULT_FILENAME_TEMPLATE = '${Author}-${Title} - Chapter %02d.${ext}';

const EXT_TOKEN = '${ext}';

export interface NumberDirective {
  leftAlign: boolean;
  zeroPad: boolean;
  sign: '' | '+' | ' ';
  width: number;
}

/**
 * A filename template split around its single chapter-number directive. The
 * literal parts have `%%` already reduced to `%`.
 */
export interface FilenameTemplate {
  source: string;
  prefix: string;
  directive: NumberDirective;
  suffix: string;
}

const DIRECTIVE_PATTERN = /^%([-+ 0]*)(\d*)[diu]/;

export function compileTemplate(template: string): FilenameTemplate {
  const literals: string[] = [];
  const directives: NumberDirective[] = [];

  let literal = '';
  let position = 0;
  while (position < template.length) {
    const percent = template.indexOf('%', position);
    if (percent === -1) {
      literal += template.slice(position);
      break;
    }

    literal += template.slice(position, percent);

    if (template[percent + 1] === '%') {
      literal += '%';
      position = percent + 2;
      continue;
    }

    const match = DIRECTIVE_PATTERN.exec(template.slice(percent));
    if (!match) {
      throw new TemplateConfigError(
        `Unsupported format sequence "${template.slice(percent, percent + 3)}" in filename template "${template}". ` +
          'Use a single integer directive such as %02d and write a literal percent sign as %%.',
      );
    }

    directives.push(parseDirective(match[1] ?? '', match[2] ?? ''));
    literals.push(literal);
    literal = '';
    position = percent + match[0].length;
  }
  literals.push(literal);

  const [directive] = directives;
  if (directives.length !== 1 || !directive) {
    throw new TemplateConfigError(
      `Filename template "${template}" must contain exactly one chapter number directive such as %02d, found ${directives.length}`,
    );
  }

  return {
    source: template,
    prefix: literals[0] ?? '',
    directive,
    suffix: literals[1] ?? '',
  };
}

export function substituteTokens(text: string, identity: BookIdentity['sanitized']): string {
  return text.replaceAll('${Author}', identity.author).replaceAll('${Title}', identity.title);
}

export function formatChapterNumber(directive: NumberDirective, value: number): string {
  const digits = String(Math.abs(Math.trunc(value)));
  const sign = value < 0 ? '-' : directive.sign;

  if (directive.leftAlign) {
    return (sign + digits).padEnd(directive.width, ' ');
  }
  if (directive.zeroPad) {
    return sign + digits.padStart(directive.width - sign.length, '0');
  }
  return (sign + digits).padStart(directive.width, ' ');
}

export function renderFileName(
  template: FilenameTemplate,
  chapterIndex: number,
  identity: BookIdentity,
  format: AudioFormat,
): string {
  const fileName = substituteTokens(template.prefix, identity.sanitized) +
    formatChapterNumber(template.directive, chapterIndex) +
    substituteTokens(template.suffix, identity.sanitized);

  if (fileName.includes(EXT_TOKEN)) {
    return fileName.replaceAll(EXT_TOKEN, format.slice(1));
  }
  return fileName + format;
}

function parseDirective(flags: string, width: string): NumberDirective {
  return {
    leftAlign: flags.includes('-'),
    zeroPad: flags.includes('0'),
    sign: flags.includes('+') ? '+' : flags.includes(' ') ? ' ' : '',
    width: width === '' ? 0 : parseInt(width, 10),
  };
}
