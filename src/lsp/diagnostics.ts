import { DiagnosticSeverity, type Connection, type Diagnostic } from 'vscode-languageserver/node.js';
import type { UnknownAddress } from '../engine/index.js';
import type { ServerContext } from './context.js';

export const UNKNOWN_ADDRESS_SOURCE = 'addressbook';

/** Hints for every address in the document that is not in the address book. */
export function computeDiagnostics(ctx: ServerContext, uri: string): Diagnostic[] {
  return ctx.engine.diagnostics(uri).map(toDiagnostic);
}

export function toDiagnostic(unknown: UnknownAddress): Diagnostic {
  return {
    range: unknown.range,
    severity: DiagnosticSeverity.Hint,
    source: UNKNOWN_ADDRESS_SOURCE,
    message: unknown.message,
    data: { address: unknown.address },
  };
}

/** The part of the connection that delivers diagnostics. */
export type DiagnosticsSink = Pick<Connection, 'sendDiagnostics'>;

/** Publish the hints for one document, or clear them once it is closed. */
export async function publishDiagnostics(sink: DiagnosticsSink, ctx: ServerContext, uri: string): Promise<void> {
  if (!ctx.documents.has(uri)) {
    await sink.sendDiagnostics({ uri, diagnostics: [] });
    return;
  }
  const { version } = ctx.documents.get(uri);
  await sink.sendDiagnostics({ uri, version, diagnostics: computeDiagnostics(ctx, uri) });
}

/** Republish for every open document, e.g. after the address book changed. */
export async function publishAllDiagnostics(sink: DiagnosticsSink, ctx: ServerContext): Promise<void> {
  await Promise.all(ctx.documents.uris().map(uri => publishDiagnostics(sink, ctx, uri)));
}
