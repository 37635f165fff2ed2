import { TextDocumentSyncKind, CodeActionKind, type ServerCapabilities } from 'vscode-languageserver/node.js';
import type { Features } from '../engine/index.js';
import { CREATE_CONTACT_COMMAND, RELOAD_CONTACTS_COMMAND } from './context.js';

/** Characters that keep an address completion going. */
export const COMPLETION_TRIGGER_CHARACTERS = ['@', '<', '.'];

/** Advertise only what is enabled; a disabled feature is refused if requested anyway. */
export function buildCapabilities(features: Features): ServerCapabilities {
  const capabilities: ServerCapabilities = {
    textDocumentSync: {
      openClose: true,
      change: TextDocumentSyncKind.Incremental,
    },
    executeCommandProvider: {
      commands: [RELOAD_CONTACTS_COMMAND, CREATE_CONTACT_COMMAND],
    },
  };

  if (features.hover) capabilities.hoverProvider = true;
  if (features.gotoDefinition) capabilities.definitionProvider = true;
  if (features.completion) {
    capabilities.completionProvider = { triggerCharacters: COMPLETION_TRIGGER_CHARACTERS };
  }
  if (features.codeActions) {
    capabilities.codeActionProvider = { codeActionKinds: [CodeActionKind.QuickFix] };
  }
  return capabilities;
}
