import type { AddressToken, ByteSpan, Contact, Position, Range } from '../types/index.js';
import type { DocumentSnapshot } from '../documents/document.js';
import type { DocumentStore } from '../documents/store.js';
import type { ContactIndex, IndexEntry } from '../store/contact-index.js';
import type { IndexHolder } from '../store/index-holder.js';
import { analyze, findRegionAt, findTokenAt, partialAt, type Extraction } from '../extract/index.js';
import { formatMailbox } from '../contacts/index.js';
import { CapabilityDisabledError } from '../utils/index.js';
import { rankEntries } from './completion.js';
import { ALL_FEATURES, type Feature, type Features } from './features.js';

export const UNKNOWN_ADDRESS_MESSAGE = 'Address is not in contacts';
export const ADD_TO_CONTACTS = 'Add to contacts';

interface Located {
  address: string;
  displayName?: string;
  span: ByteSpan;
  range: Range;
}

export type HoverResult =
  | (Located & { kind: 'contact'; entry: IndexEntry })
  | (Located & { kind: 'unknown' });

export interface DefinitionResult {
  path: string;
  /** Line of the matching EMAIL property, or of the card itself. */
  line: number;
}

export interface CompletionCandidate {
  address: string;
  displayName?: string;
  contact: Contact;
  label: string;
  insertText: string;
  rank: number;
  span: ByteSpan;
  range: Range;
}

export interface CompletionResult {
  items: CompletionCandidate[];
  isIncomplete: boolean;
}

export type UnknownAddress = Located & { message: string };

export interface AddContactAction {
  title: string;
  address: string;
  displayName?: string;
  /** The unknown address this action would resolve. */
  range: Range;
}

interface QueryContext {
  document: DocumentSnapshot;
  index: ContactIndex;
  extraction: Extraction;
}

/**
 * Hover, definition, completion, diagnostics and code actions. Every query reads the document
 * snapshot and the index snapshot once and computes only from those.
 */
export class ResolutionEngine {
  private readonly documents: DocumentStore;
  private readonly holder: IndexHolder;
  private readonly features: Features;
  private readonly extractions = new WeakMap<DocumentSnapshot, Extraction>();

  constructor(documents: DocumentStore, holder: IndexHolder, features: Features = ALL_FEATURES) {
    this.documents = documents;
    this.holder = holder;
    this.features = features;
  }

  isEnabled(feature: Feature): boolean {
    return this.features[feature];
  }

  hover(uri: string, position: Position): HoverResult | undefined {
    this.require('hover');
    const ctx = this.context(uri);
    const token = findTokenAt(ctx.extraction.tokens, ctx.document.positionToOffset(position));
    if (!token) return undefined;

    const located = locate(ctx.document, token);
    const entry = ctx.index.lookup(token.address);
    return entry ? { ...located, kind: 'contact', entry } : { ...located, kind: 'unknown' };
  }

  definition(uri: string, position: Position): DefinitionResult | undefined {
    this.require('gotoDefinition');
    const ctx = this.context(uri);
    const token = findTokenAt(ctx.extraction.tokens, ctx.document.positionToOffset(position));
    if (!token) return undefined;

    const entry = ctx.index.lookup(token.address);
    if (!entry) return undefined;
    return {
      path: entry.contact.source.path,
      line: entry.email.line ?? entry.contact.source.line ?? 0,
    };
  }

  completion(uri: string, position: Position): CompletionResult {
    this.require('completion');
    const ctx = this.context(uri);
    const offset = ctx.document.positionToOffset(position);
    const region = findRegionAt(ctx.extraction.regions, offset);
    if (!region) return { items: [], isIncomplete: false };

    const partial = partialAt(ctx.document.lines, offset);
    const span = { start: partial.start, end: partial.end };
    const range = toRange(ctx.document, span);
    const asMailbox = region.region.kind === 'header' && !partial.inAngleBrackets;

    const { ranked, truncated } = rankEntries(ctx.index.entries(), partial.text);
    const items = ranked.map(({ entry, rank }): CompletionCandidate => {
      const address = entry.email.value;
      const displayName = entry.contact.displayName;
      const label = formatMailbox(address, displayName);
      return {
        address,
        displayName,
        contact: entry.contact,
        label,
        insertText: asMailbox ? label : address,
        rank,
        span,
        range,
      };
    });
    return { items, isIncomplete: truncated };
  }

  /** Addresses in the document that no contact claims. */
  diagnostics(uri: string): UnknownAddress[] {
    const ctx = this.context(uri);
    return ctx.extraction.tokens
      .filter(token => !ctx.index.has(token.address))
      .map(token => ({ ...locate(ctx.document, token), message: UNKNOWN_ADDRESS_MESSAGE }));
  }

  codeActions(uri: string, range: Range): AddContactAction[] {
    this.require('codeActions');
    const ctx = this.context(uri);
    const token = findTokenAt(ctx.extraction.tokens, ctx.document.positionToOffset(range.start));
    if (!token || ctx.index.has(token.address)) return [];

    const located = locate(ctx.document, token);
    const action: AddContactAction = { title: ADD_TO_CONTACTS, address: token.address, range: located.range };
    if (token.displayName) action.displayName = token.displayName;
    return [action];
  }

  private require(feature: Feature): void {
    if (!this.features[feature]) throw new CapabilityDisabledError(feature);
  }

  private context(uri: string): QueryContext {
    const document = this.documents.get(uri);
    const index = this.holder.current;
    let extraction = this.extractions.get(document);
    if (!extraction) {
      extraction = analyze(document.text, document.lines);
      this.extractions.set(document, extraction);
    }
    return { document, index, extraction };
  }
}

function locate(document: DocumentSnapshot, token: AddressToken): Located {
  const span = { start: token.start, end: token.end };
  const located: Located = { address: token.address, span, range: toRange(document, span) };
  if (token.displayName) located.displayName = token.displayName;
  return located;
}

function toRange(document: DocumentSnapshot, span: ByteSpan): Range {
  return {
    start: document.offsetToPosition(span.start),
    end: document.offsetToPosition(span.end),
  };
}
