export interface ContactEmail {
  value: string;
  type?: string;
  primary?: boolean;
  /** 0-based line of the EMAIL property (or list entry) that defines this address. */
  line?: number;
}

export type ContactFieldKey =
  | 'nickname'
  | 'phone'
  | 'organization'
  | 'title'
  | 'url'
  | 'note'
  | 'birthday'
  | 'address';

export interface ContactField {
  key: ContactFieldKey;
  value: string;
  type?: string;
}

export interface SourceLocation {
  /** Absolute path of the file the contact was read from. */
  path: string;
  line?: number;
}

export interface Contact {
  id: string;
  displayName?: string;
  emails: ContactEmail[];
  fields: ContactField[];
  source: SourceLocation;
}
