#!/usr/bin/env node
import 'dotenv/config';
import { pathToFileURL } from 'node:url';
import { toCycleError } from '../../shared/src/index.js';
import { loadBackendConfig } from './config.js';
import { formatOutcome, formatScores } from './format.js';
import { createRuntime, type Runtime } from './runtime.js';

const USAGE = `Usage: sorter <command>

Commands:
  test                           Check that the peripheral and model server respond
  once                           Run a single capture -> classify -> sort cycle
  continuous <interval_seconds>  Run cycles until interrupted (Ctrl+C)`;

function describe(err: unknown): string {
  const error = toCycleError(err, 'TransportError');
  return `${error.kind}: ${error.message}`;
}

/** Wait between cycles. Unlike a cycle, this wait ends early on interrupt. */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

async function probe(runtime: Runtime): Promise<void> {
  const { config, peripheral, engine } = runtime;

  if (config.captureMode === 'remote' || config.actuatorMode === 'remote') {
    console.log(`Peripheral ${config.peripheralUrl}`);
    try {
      const status = await peripheral.status();
      console.log(
        `  status: online (camera ${status.cameraAvailable ? 'open' : 'not opened yet'}, ` +
          `gpio ${status.actuatorReady ? 'initialized' : 'not initialized'})`,
      );
    } catch (err) {
      console.log(`  status: ${describe(err)}`);
    }

    try {
      const test = await peripheral.selfTest();
      console.log(`  self-test: ${test.message} (frame ${test.camera_shape.join('x')})`);
    } catch (err) {
      console.log(`  self-test: ${describe(err)}`);
    }
  } else {
    console.log('Camera and motors are local; no peripheral to probe');
  }

  if (engine.probe) {
    try {
      await engine.probe();
      console.log(`Model server ${config.modelUrl}: reachable`);
    } catch (err) {
      console.log(`Model server ${config.modelUrl}: ${describe(err)}`);
    }
  }
}

async function once(runtime: Runtime): Promise<void> {
  const { controller, config } = runtime;
  controller.start();
  console.log(formatOutcome(await controller.runCycle(config.peripheralId)));
  console.log(formatScores(controller.stop()));
}

async function continuous(runtime: Runtime, intervalMs: number, signal: AbortSignal): Promise<void> {
  const { controller, config } = runtime;
  controller.start();
  console.log(`Sorting every ${intervalMs / 1000}s, Ctrl+C to stop`);

  while (!signal.aborted) {
    // A running cycle is never cut short; the interrupt is honored once it resolves.
    console.log(formatOutcome(await controller.runCycle(config.peripheralId)));
    if (signal.aborted) break;
    await pause(intervalMs, signal);
  }

  console.log(formatScores(controller.stop()));
}

/** Run one CLI command. Resolves to the process exit code. */
export async function runCli(args: readonly string[], runtime: Runtime, signal: AbortSignal): Promise<number> {
  const [command, interval] = args;

  switch (command) {
    case 'test':
      await probe(runtime);
      return 0;
    case 'once':
      await once(runtime);
      return 0;
    case 'continuous': {
      const seconds = Number(interval);
      if (interval === undefined || !Number.isFinite(seconds) || seconds <= 0) {
        console.error('continuous needs a positive interval in seconds\n');
        console.error(USAGE);
        return 1;
      }
      await continuous(runtime, seconds * 1000, signal);
      return 0;
    }
    default:
      console.error(USAGE);
      return 1;
  }
}

async function main(): Promise<void> {
  const runtime = createRuntime(loadBackendConfig());
  const interrupt = new AbortController();

  const onSignal = () => {
    if (!interrupt.signal.aborted) console.log('\nStopping after the current cycle...');
    interrupt.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    process.exitCode = await runCli(process.argv.slice(2), runtime, interrupt.signal);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await runtime.shutdown();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
