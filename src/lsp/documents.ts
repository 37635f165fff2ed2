import type {
  Connection,
  DidChangeTextDocumentParams,
  DidCloseTextDocumentParams,
  DidOpenTextDocumentParams,
  TextDocumentContentChangeEvent,
} from 'vscode-languageserver/node.js';
import type { ContentChange } from '../types/index.js';
import { errorMessage, logger } from '../utils/index.js';
import type { ServerContext } from './context.js';
import { publishDiagnostics } from './diagnostics.js';

export function handleDidOpen(ctx: ServerContext, params: DidOpenTextDocumentParams): void {
  const { uri, text, version } = params.textDocument;
  ctx.documents.open(uri, text, version);
  logger.debug('Opened', uri, 'version', version);
}

export function handleDidChange(ctx: ServerContext, params: DidChangeTextDocumentParams): void {
  const { uri, version } = params.textDocument;
  ctx.documents.change(uri, version, params.contentChanges.map(toContentChange));
}

export function handleDidClose(ctx: ServerContext, params: DidCloseTextDocumentParams): void {
  ctx.documents.close(params.textDocument.uri);
  logger.debug('Closed', params.textDocument.uri);
}

export function toContentChange(event: TextDocumentContentChangeEvent): ContentChange {
  return 'range' in event ? { range: event.range, text: event.text } : { text: event.text };
}

/**
 * Document notifications are applied synchronously, so they take effect in arrival order.
 * A rejected change leaves the stored text as it was and is reported to the user.
 */
export function registerDocumentHandlers(connection: Connection, ctx: ServerContext): void {
  const publish = (uri: string): void => {
    publishDiagnostics(connection, ctx, uri).catch(err => logger.warn('Failed to publish diagnostics:', errorMessage(err)));
  };

  connection.onDidOpenTextDocument(params => {
    handleDidOpen(ctx, params);
    publish(params.textDocument.uri);
  });
  connection.onDidChangeTextDocument(params => {
    try {
      handleDidChange(ctx, params);
    } catch (err) {
      logger.warn('Rejected change:', errorMessage(err));
      connection.window.showWarningMessage(errorMessage(err));
      return;
    }
    publish(params.textDocument.uri);
  });
  connection.onDidCloseTextDocument(params => {
    handleDidClose(ctx, params);
    publish(params.textDocument.uri);
  });
}
