#!/usr/bin/env node
import * as fs from 'fs';

import { config, SERVER_INFO } from './config.js';
import { createRegistry } from './providers/index.js';
import { runStdioLoop } from './server/transport.js';
import { SqliteStore } from './store/sqliteStore.js';
import { debugLog, errorLog } from './utils/logger.js';

if (!fs.existsSync(config.dbPath)) {
  errorLog(`Database not found at ${config.dbPath}; run the loader first (npm run load)`);
  process.exit(1);
}

const registry = createRegistry(new SqliteStore(config.dbPath));

debugLog('Server initialized with tools:', registry.list().map((tool) => tool.name).join(', '));

// Server startup function
async function runServer() {
  console.error(`${SERVER_INFO.name} running on stdio`);
  await runStdioLoop(registry);
  debugLog('Input closed, shutting down');
}

// Start the server
runServer().catch((error) => {
  errorLog('Fatal error running server:', error);
  process.exit(1);
});
