export interface Book {
  metadata: BookMetadata;
  items: ContentItem[];
}

export interface BookMetadata {
  titles: string[];
  creators: string[];
}

export type ContentItemType = 'document' | 'navigation' | 'style' | 'image' | 'font' | 'other';

export interface ContentItem {
  id: string;
  href: string;
  mediaType: string;
  type: ContentItemType;
  content: Uint8Array;
}

export interface Chapter {
  index: number;
  text: string;
}

export interface BookIdentity {
  author: string;
  title: string;
  sanitized: {
    author: string;
    title: string;
  };
}

export interface IdentityOverrides {
  author?: string | undefined;
  title?: string | undefined;
}

export interface OpfManifest {
  metadata: BookMetadata;
  items: ManifestItem[];
  baseDir: string;
}

export interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
}
