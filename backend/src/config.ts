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

const mode = z.enum(['remote', 'local']).default('remote');
const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const backendSchema = z.object({
  port: z.coerce.number().int().positive().default(5000),
  peripheralId: z.string().min(1).default('pi'),
  peripheralUrl: z
    .string()
    .url()
    .default('http://raspberrypi.local:5001')
    .transform((url) => url.replace(/\/+$/, '')),
  captureMode: mode,
  actuatorMode: mode,
  requestTimeoutMs: millis(3000),
  modelUrl: z.string().url().default('http://localhost:8501/v1/models/sorter:predict'),
  modelTimeoutMs: millis(5000),
  frame: frameSchema,
  actuation: actuationSchema,
  hardware: hardwareSchema,
});

export type BackendConfig = z.infer<typeof backendSchema>;

/** Load the inference/session node's configuration from the environment. */
export function loadBackendConfig(env: Env = process.env): BackendConfig {
  return parseConfig(backendSchema, {
    port: getEnv(env, 'PORT'),
    peripheralId: getEnv(env, 'PERIPHERAL_ID'),
    peripheralUrl: getEnv(env, 'PERIPHERAL_URL'),
    captureMode: getEnv(env, 'CAPTURE_MODE'),
    actuatorMode: getEnv(env, 'ACTUATOR_MODE'),
    requestTimeoutMs: getEnv(env, 'REQUEST_TIMEOUT_MS'),
    modelUrl: getEnv(env, 'MODEL_URL'),
    modelTimeoutMs: getEnv(env, 'MODEL_TIMEOUT_MS'),
    frame: readFrameEnv(env),
    actuation: readActuationEnv(env),
    hardware: readHardwareEnv(env),
  });
}
