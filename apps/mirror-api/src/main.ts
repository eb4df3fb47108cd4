import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

function main() {
  const config = loadConfig();
  const { app } = createApp(config);

  console.log(`[plc-mirror] Recovery window: ${config.recoveryWindowMs / 3_600_000}h`);
  console.log(`[plc-mirror] Import ${config.importToken ? 'requires a bearer token' : 'is open'}`);
  console.log(`[plc-mirror] Starting mirror on port ${config.port}...`);

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`[plc-mirror] Server running at http://localhost:${info.port}`);
  });
}

try {
  main();
} catch (err) {
  console.error('[plc-mirror] Failed to start:', err);
  process.exitCode = 1;
}
