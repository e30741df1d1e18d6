import type { BookIdentity, BookMetadata, IdentityOverrides } from './types';

export const UNKNOWN_AUTHOR = 'Unknown Author';
export const UNKNOWN_TITLE = 'Unknown Title';

const UNSAFE_FILENAME_CHARACTERS = /[\\/*?:"<>|]/g;

export function resolveIdentity(metadata: BookMetadata, overrides: IdentityOverrides = {}): BookIdentity {
  // Only the first metadata value counts; an empty one falls back instead of trying the next
  const author = overrides.author || metadata.creators[0] || UNKNOWN_AUTHOR;
  const title = overrides.title || metadata.titles[0] || UNKNOWN_TITLE;

  return {
    author,
    title,
    sanitized: {
      author: sanitizeForFilename(author),
      title: sanitizeForFilename(title),
    },
  };
}

export function sanitizeForFilename(value: string): string {
  return value.replace(UNSAFE_FILENAME_CHARACTERS, '');
}
