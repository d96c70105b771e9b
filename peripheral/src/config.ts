import { z } from 'zod';
import {
  actuationSchema,
  frameSchema,
  getEnv,
  hardwareSchema,
  parseConfig,
  readActuationEnv,
  readFrameEnv,
  readHardwareEnv,
  type Env,
} from '../../shared/src/index.js';

const peripheralSchema = z.object({
  port: z.coerce.number().int().positive().default(5001),
  frame: frameSchema,
  actuation: actuationSchema,
  hardware: hardwareSchema,
});

export type PeripheralConfig = z.infer<typeof peripheralSchema>;

/** Load the peripheral node's configuration from the environment. */
export function loadPeripheralConfig(env: Env = process.env): PeripheralConfig {
  return parseConfig(peripheralSchema, {
    port: getEnv(env, 'PERIPHERAL_PORT'),
    frame: readFrameEnv(env),
    actuation: readActuationEnv(env),
    hardware: readHardwareEnv(env),
  });
}
