#!/usr/bin/env node
import { createConnection, ProposedFeatures } from 'vscode-languageserver/node.js';
import { createServer, SERVER_NAME } from './server.js';
import { logger } from './utils/index.js';

async function main() {
  // Reads the transport from the command line (--stdio, --node-ipc, --socket=N).
  const connection = createConnection(ProposedFeatures.all);
  createServer(connection);
  connection.listen();

  logger.info(`${SERVER_NAME} listening`);
}

main().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
