import type { ContactIndex } from '../store/contact-index.js';

export type LoadWarningKind = 'missing-source' | 'unreadable' | 'parse-error' | 'duplicate-address';

export interface LoadWarning {
  kind: LoadWarningKind;
  path: string;
  message: string;
  line?: number;
  address?: string;
}

export interface LoadResult {
  index: ContactIndex;
  warnings: LoadWarning[];
}

export interface ContactSources {
  directory?: string;
  listFile?: string;
}
