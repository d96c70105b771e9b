import 'dotenv/config';
import {
  FfmpegCameraDriver,
  LocalActuator,
  LocalCamera,
  ResourceLock,
  SysfsGpio,
  serve,
} from '../../shared/src/index.js';
import { loadPeripheralConfig } from './config.js';
import { createPeripheralHandler } from './server.js';

const config = loadPeripheralConfig();
const { actuation, hardware } = config;

const camera = new LocalCamera({
  source: 'local',
  devices: hardware.cameraDevices,
  frame: config.frame,
  driver: new FfmpegCameraDriver(hardware.cameraTimeoutMs),
});
const motors = new LocalActuator({
  output: new SysfsGpio(hardware.gpioRoot),
  channels: [actuation.canPin, actuation.plasticPin],
});
const lock = new ResourceLock('peripheral');

console.log('[peripheral] Starting peripheral server');
console.log(`[peripheral] Cameras: ${hardware.cameraDevices.join(', ')}`);
console.log(`[peripheral] Motors: can=pin ${actuation.canPin}, plastic=pin ${actuation.plasticPin}`);
console.log(`[peripheral] Timing: can=${actuation.canSeconds}s, plastic=${actuation.plasticSeconds}s`);

const server = serve(createPeripheralHandler({ camera, motors, actuation, lock }), {
  port: config.port,
  name: 'peripheral',
});

async function shutdown(signal: string): Promise<void> {
  console.log(`[peripheral] ${signal} received, waiting for hardware to go idle`);
  server.close();
  await lock.whenFree();
  await motors.shutdown();
  console.log('[peripheral] Motors off, bye');
}

process.once('SIGINT', () => {
  shutdown('SIGINT').catch(console.error);
});
process.once('SIGTERM', () => {
  shutdown('SIGTERM').catch(console.error);
});
