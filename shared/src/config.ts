import { z } from 'zod';
import type { ActuationCommand, Label } from './types.js';
import { describeIssues } from './http/json.js';

export type Env = Record<string, string | undefined>;

/** Read an env var, treating empty strings as unset. */
export const getEnv = (env: Env, key: string): string | undefined => {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
};

const seconds = z.coerce.number().positive().max(30);

export const actuationSchema = z.object({
  canPin: z.coerce.number().int().nonnegative().default(17),
  plasticPin: z.coerce.number().int().nonnegative().default(27),
  canSeconds: seconds.default(1.0),
  plasticSeconds: seconds.default(2.0),
});

export const frameSchema = z.object({
  width: z.coerce.number().int().positive().default(640),
  height: z.coerce.number().int().positive().default(480),
});

/** Camera and GPIO settings for a node that owns the hardware. */
export const hardwareSchema = z.object({
  cameraDevices: z
    .string()
    .default('/dev/video0,/dev/video1,/dev/video2')
    .transform((list) => list.split(',').map((d) => d.trim()).filter((d) => d.length > 0))
    .pipe(z.array(z.string()).min(1, 'CAMERA_DEVICES must name at least one device')),
  cameraTimeoutMs: z.coerce.number().int().positive().default(4000),
  gpioRoot: z.string().default('/sys/class/gpio'),
});

export type ActuationConfig = z.infer<typeof actuationSchema>;
export type FrameConfig = z.infer<typeof frameSchema>;
export type HardwareConfig = z.infer<typeof hardwareSchema>;

export function readActuationEnv(env: Env) {
  return {
    canPin: getEnv(env, 'MOTOR_CAN_PIN'),
    plasticPin: getEnv(env, 'MOTOR_PLASTIC_PIN'),
    canSeconds: getEnv(env, 'MOTOR_TIME_CAN'),
    plasticSeconds: getEnv(env, 'MOTOR_TIME_PLASTIC'),
  };
}

export function readFrameEnv(env: Env) {
  return {
    width: getEnv(env, 'FRAME_WIDTH'),
    height: getEnv(env, 'FRAME_HEIGHT'),
  };
}

export function readHardwareEnv(env: Env) {
  return {
    cameraDevices: getEnv(env, 'CAMERA_DEVICES'),
    cameraTimeoutMs: getEnv(env, 'CAMERA_TIMEOUT_MS'),
    gpioRoot: getEnv(env, 'GPIO_ROOT'),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * How long a remote capture may take: the peripheral tries every candidate
 * device in turn, each bounded by the camera timeout, before it answers.
 */
export function captureTimeoutMs(hardware: HardwareConfig, requestTimeoutMs: number): number {
  return hardware.cameraDevices.length * hardware.cameraTimeoutMs + requestTimeoutMs;
}

/** Validate once at startup; the result is frozen for the life of the process. */
export function parseConfig<T extends object>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  return deepFreeze(parsed.data);
}

/**
 * The only place a label becomes a channel and a run time. Nothing a
 * caller sends can change how long a motor runs.
 */
export function commandFor(label: Label, actuation: ActuationConfig): ActuationCommand {
  return label === 'can'
    ? { label, channel: actuation.canPin, durationMs: Math.round(actuation.canSeconds * 1000) }
    : { label, channel: actuation.plasticPin, durationMs: Math.round(actuation.plasticSeconds * 1000) };
}
