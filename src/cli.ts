#!/usr/bin/env node
/**
 * ResearchFlow service entry point
 */

import 'dotenv/config';
import { ResearchService } from './service/server.js';

const service = new ResearchService();

async function shutdown(signal: string): Promise<void> {
  console.log(`Received ${signal}, shutting down`);
  await service.stop();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
}

service.start().catch((error) => {
  console.error('Failed to start service:', error);
  process.exit(1);
});
