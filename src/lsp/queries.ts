import {
  CodeActionKind,
  CompletionItemKind,
  MarkupKind,
  type CodeAction,
  type CodeActionParams,
  type CompletionItem,
  type CompletionList,
  type Connection,
  type Diagnostic,
  type Hover,
  type HoverParams,
  type Location,
  type CompletionParams,
  type DefinitionParams,
  type ResponseError,
} from 'vscode-languageserver/node.js';
import type { AddContactAction, CompletionCandidate, DefinitionResult, HoverResult } from '../engine/index.js';
import { renderContact, renderUnknownAddress } from '../contacts/index.js';
import { comparePositions } from '../documents/index.js';
import { toFileUri } from '../utils/index.js';
import { CREATE_CONTACT_COMMAND, type ServerContext } from './context.js';
import { guard } from './errors.js';
import { UNKNOWN_ADDRESS_SOURCE } from './diagnostics.js';

export function handleHover(ctx: ServerContext, params: HoverParams): Hover | null | ResponseError<void> {
  return guard(() => {
    const result = ctx.engine.hover(params.textDocument.uri, params.position);
    return result ? toHover(result) : null;
  });
}

export function handleDefinition(ctx: ServerContext, params: DefinitionParams): Location | null | ResponseError<void> {
  return guard(() => {
    const result = ctx.engine.definition(params.textDocument.uri, params.position);
    return result ? toLocation(result) : null;
  });
}

export function handleCompletion(ctx: ServerContext, params: CompletionParams): CompletionList | ResponseError<void> {
  return guard(() => {
    const { items, isIncomplete } = ctx.engine.completion(params.textDocument.uri, params.position);
    return { isIncomplete, items: items.map(toCompletionItem) };
  });
}

export function handleCodeAction(ctx: ServerContext, params: CodeActionParams): CodeAction[] | ResponseError<void> {
  return guard(() => ctx.engine
    .codeActions(params.textDocument.uri, params.range)
    .map(action => toCodeAction(action, params.context.diagnostics)));
}

export function registerQueryHandlers(connection: Connection, ctx: ServerContext): void {
  connection.onHover(params => handleHover(ctx, params));
  connection.onDefinition(params => handleDefinition(ctx, params));
  connection.onCompletion(params => handleCompletion(ctx, params));
  connection.onCodeAction(params => handleCodeAction(ctx, params));
}

export function toHover(result: HoverResult): Hover {
  const value = result.kind === 'contact'
    ? renderContact(result.entry.contact)
    : renderUnknownAddress(result.address, result.displayName);
  return { contents: { kind: MarkupKind.Markdown, value }, range: result.range };
}

export function toLocation(result: DefinitionResult): Location {
  const position = { line: result.line, character: 0 };
  return { uri: toFileUri(result.path), range: { start: position, end: position } };
}

export function toCompletionItem(candidate: CompletionCandidate, order: number): CompletionItem {
  return {
    label: candidate.label,
    kind: CompletionItemKind.Text,
    detail: candidate.displayName,
    documentation: { kind: MarkupKind.Markdown, value: renderContact(candidate.contact) },
    // Keep the engine's order even when the client re-sorts by sortText.
    sortText: String(order).padStart(4, '0'),
    filterText: filterTextOf(candidate),
    textEdit: { range: candidate.range, newText: candidate.insertText },
  };
}

/** Everything the server matched on, so client-side filtering keeps the item. */
function filterTextOf(candidate: CompletionCandidate): string {
  const nicknames = candidate.contact.fields.filter(f => f.key === 'nickname').map(f => f.value);
  const words = candidate.displayName ? [candidate.displayName, ...nicknames] : nicknames;
  return [...words, candidate.address].join(' ');
}

export function toCodeAction(action: AddContactAction, diagnostics: Diagnostic[]): CodeAction {
  const at = action.range.start;
  const fixes = diagnostics.filter(d => d.source === UNKNOWN_ADDRESS_SOURCE
    && comparePositions(d.range.start, at) <= 0
    && comparePositions(at, d.range.end) <= 0);
  const args = action.displayName ? { address: action.address, name: action.displayName } : { address: action.address };
  const codeAction: CodeAction = {
    title: action.title,
    kind: CodeActionKind.QuickFix,
    command: { title: action.title, command: CREATE_CONTACT_COMMAND, arguments: [args] },
  };
  if (fixes.length > 0) codeAction.diagnostics = fixes;
  return codeAction;
}
