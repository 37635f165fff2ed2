import {
  ErrorCodes,
  ResponseError,
  type Connection,
  type InitializeError,
  type InitializeResult,
} from 'vscode-languageserver/node.js';
import { resolveConfig, type AppConfig } from './config.js';
import { DocumentStore } from './documents/index.js';
import { ResolutionEngine } from './engine/index.js';
import { ContactsWatcher, IndexHolder, VCardStore } from './store/index.js';
import {
  buildCapabilities,
  publishAllDiagnostics,
  registerCommandHandlers,
  registerDocumentHandlers,
  registerQueryHandlers,
  type ServerContext,
} from './lsp/index.js';
import { attachLogSink, errorMessage, logger, type LogLevel } from './utils/index.js';

export const SERVER_NAME = 'addressbook-ls';
export const SERVER_VERSION = '0.1.0';

export function createContext(config: AppConfig, documents: DocumentStore = new DocumentStore()): ServerContext {
  const store = new VCardStore(
    { directory: config.vcardDir, listFile: config.contactListFile },
    new IndexHolder(),
  );
  return {
    documents,
    store,
    engine: new ResolutionEngine(documents, store.holder, config.features),
  };
}

/** Wire the language server onto a connection. Handlers exist once `initialize` has succeeded. */
export function createServer(connection: Connection): void {
  let ctx: ServerContext | undefined;
  let watcher: ContactsWatcher | undefined;

  const reload = async (reason: string): Promise<void> => {
    if (!ctx) return;
    logger.debug('Reloading contacts:', reason);
    const outcome = await ctx.store.reload();
    logger.info('Contacts generation', outcome.generation, 'ready:', outcome.addresses, 'addresses');
    await publishAllDiagnostics(connection, ctx);
  };
  const reloadInBackground = (reason: string): void => {
    reload(reason).catch(err => logger.error('Contacts reload failed:', errorMessage(err)));
  };

  connection.onInitialize(async (params): Promise<InitializeResult | ResponseError<InitializeError>> => {
    // From here on warnings and errors also reach the client's log.
    attachLogSink((level, message) => forwardLog(connection, level, message));

    let config: AppConfig;
    try {
      config = await resolveConfig(params.initializationOptions);
    } catch (err) {
      logger.error('Initialization failed:', errorMessage(err));
      return new ResponseError(ErrorCodes.InvalidParams, errorMessage(err), { retry: false });
    }

    const context = createContext(config);
    ctx = context;
    registerDocumentHandlers(connection, context);
    registerQueryHandlers(connection, context);
    registerCommandHandlers(connection, context);

    watcher = new ContactsWatcher({
      directory: context.store.directory,
      listFile: context.store.listFile,
      onChange: () => reloadInBackground('contacts changed on disk'),
    });

    logger.info('Contacts directory:', context.store.directory ?? '(none)', 'list file:', context.store.listFile ?? '(none)');
    return {
      capabilities: buildCapabilities(config.features),
      serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
    };
  });

  connection.onInitialized(() => {
    reloadInBackground('startup');
    watcher?.start().catch(err => logger.warn('Contacts watcher failed to start:', errorMessage(err)));
  });

  connection.onDidChangeWatchedFiles(() => reloadInBackground('client reported file changes'));

  connection.onShutdown(async () => {
    await watcher?.stop();
    attachLogSink(undefined);
  });
}

function forwardLog(connection: Connection, level: LogLevel, message: string): void {
  switch (level) {
    case 'error':
      connection.console.error(message);
      break;
    case 'warn':
      connection.console.warn(message);
      break;
    case 'info':
      connection.console.info(message);
      break;
    default:
      connection.console.log(message);
  }
}
