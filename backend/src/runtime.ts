import {
  FfmpegCameraDriver,
  LocalActuator,
  LocalCamera,
  RemoteActuator,
  RemoteCamera,
  SysfsGpio,
  captureTimeoutMs,
  type ActuatorController,
  type CameraDriver,
  type CaptureSource,
  type DigitalOutput,
  type FetchLike,
} from '../../shared/src/index.js';
import type { BackendConfig } from './config.js';
import { SessionController } from './controller.js';
import { ModelServerEngine, type InferenceEngine } from './inference.js';
import { PeripheralClient } from './peripheralClient.js';

/** Seams for swapping out the network and hardware. */
export interface RuntimeDeps {
  fetchImpl?: FetchLike;
  cameraDriver?: CameraDriver;
  output?: DigitalOutput;
  engine?: InferenceEngine & { probe?: () => Promise<void> };
}

export interface Runtime {
  config: BackendConfig;
  controller: SessionController;
  engine: InferenceEngine & { probe?: () => Promise<void> };
  peripheral: PeripheralClient;
  /** Wait for in-flight cycles, then switch off any local motors. */
  shutdown(): Promise<void>;
}

/**
 * Wire the orchestrator. Whether the camera and motors are local or on the
 * peripheral is decided here, once, from CAPTURE_MODE / ACTUATOR_MODE.
 */
export function createRuntime(config: BackendConfig, deps: RuntimeDeps = {}): Runtime {
  const { fetchImpl } = deps;
  const remoteCaptureMs = captureTimeoutMs(config.hardware, config.requestTimeoutMs);

  const camera: CaptureSource =
    config.captureMode === 'local'
      ? new LocalCamera({
          source: config.peripheralId,
          devices: config.hardware.cameraDevices,
          frame: config.frame,
          driver: deps.cameraDriver ?? new FfmpegCameraDriver(config.hardware.cameraTimeoutMs),
        })
      : new RemoteCamera({
          peripheralId: config.peripheralId,
          baseUrl: config.peripheralUrl,
          timeoutMs: remoteCaptureMs,
          frame: config.frame,
          fetchImpl,
        });

  const localActuator =
    config.actuatorMode === 'local'
      ? new LocalActuator({
          output: deps.output ?? new SysfsGpio(config.hardware.gpioRoot),
          channels: [config.actuation.canPin, config.actuation.plasticPin],
        })
      : null;
  const actuator: ActuatorController =
    localActuator ??
    new RemoteActuator({
      peripheralId: config.peripheralId,
      baseUrl: config.peripheralUrl,
      timeoutMs: config.requestTimeoutMs,
      fetchImpl,
    });

  const engine =
    deps.engine ?? new ModelServerEngine({ url: config.modelUrl, timeoutMs: config.modelTimeoutMs, fetchImpl });

  const controller = new SessionController({
    engine,
    peripherals: [{ id: config.peripheralId, camera, actuator }],
    actuation: config.actuation,
  });

  const peripheral = new PeripheralClient({
    baseUrl: config.peripheralUrl,
    timeoutMs: config.requestTimeoutMs,
    selfTestTimeoutMs: remoteCaptureMs,
    fetchImpl,
  });

  return {
    config,
    controller,
    engine,
    peripheral,
    async shutdown() {
      await controller.drain();
      await localActuator?.shutdown();
    },
  };
}
