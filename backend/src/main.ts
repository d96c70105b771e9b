import 'dotenv/config';
import { serve } from '../../shared/src/index.js';
import { loadBackendConfig } from './config.js';
import { createRuntime } from './runtime.js';
import { createSessionHandler } from './server.js';

const config = loadBackendConfig();
const runtime = createRuntime(config);

console.log('[session] Starting inference/session service');
console.log(`[session] Capture: ${config.captureMode}, motors: ${config.actuatorMode}, peripheral: ${config.peripheralUrl}`);
console.log(`[session] Model server: ${config.modelUrl}`);

const server = serve(
  createSessionHandler({
    controller: runtime.controller,
    frame: config.frame,
    defaultPeripheral: config.peripheralId,
  }),
  { port: config.port, name: 'session' },
);

async function shutdown(signal: string): Promise<void> {
  console.log(`[session] ${signal} received, finishing in-flight cycles`);
  server.close();
  await runtime.shutdown();
  console.log('[session] Bye');
}

process.once('SIGINT', () => {
  shutdown('SIGINT').catch(console.error);
});
process.once('SIGTERM', () => {
  shutdown('SIGTERM').catch(console.error);
});
