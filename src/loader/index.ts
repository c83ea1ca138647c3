#!/usr/bin/env node
import { config } from '../config.js';
import { errorLog } from '../utils/logger.js';
import { ingestDirectory } from './ingest.js';

try {
  const count = ingestDirectory(config.dbPath, config.dataDir);
  console.error(`Loaded ${count} match files from ${config.dataDir} into ${config.dbPath}`);
} catch (error) {
  errorLog('Loading failed:', error);
  process.exit(1);
}
