import {
  ResourceLock,
  commandFor,
  displayName,
  encodeImage,
  errorResponse,
  json,
  motorRequestSchema,
  parseLabel,
  preflight,
  readBody,
  toCycleError,
  type ActuationConfig,
  type ActuatorController,
  type CaptureResponse,
  type CaptureSource,
  type ErrorKind,
  type Handler,
  type MotorResponse,
  type PeripheralStatusBody,
  type PeripheralTestBody,
} from '../../shared/src/index.js';

export interface PeripheralCamera extends CaptureSource {
  readonly isAvailable: boolean;
}

export interface PeripheralMotors extends ActuatorController {
  readonly isReady: boolean;
  init(): Promise<void>;
}

export interface PeripheralServiceOptions {
  camera: PeripheralCamera;
  motors: PeripheralMotors;
  actuation: ActuationConfig;
  /** Shared by every endpoint that touches the camera or the motors */
  lock?: ResourceLock;
}

function failure(err: unknown, fallback: ErrorKind): Response {
  const error = toCycleError(err, fallback);
  if (error.kind !== 'Busy') console.error(`[peripheral] ${error.kind}: ${error.message}`);
  return errorResponse(error.toFailure());
}

/**
 * HTTP surface of the peripheral. Capture, motor and self-test calls all
 * take the same lock; a call that finds it held gets 409 straight away.
 */
export function createPeripheralHandler(options: PeripheralServiceOptions): Handler {
  const { camera, motors, actuation } = options;
  const lock = options.lock ?? new ResourceLock('peripheral');

  return async (req: Request) => {
    if (req.method === 'OPTIONS') return preflight();

    const { pathname } = new URL(req.url);
    const route = `${req.method} ${pathname}`;

    switch (route) {
      case 'GET /api/status': {
        const body: PeripheralStatusBody = {
          status: 'online',
          message: lock.isHeld ? `Peripheral is busy (${lock.heldBy})` : 'Peripheral server is ready',
          camera_available: camera.isAvailable,
          gpio_initialized: motors.isReady,
        };
        return json(body);
      }

      case 'GET /api/capture': {
        console.log('[peripheral] Capture request received');
        try {
          const frame = await lock.tryRun('capture', () => camera.capture());
          const body: CaptureResponse = { status: 'success', image: encodeImage(frame.image) };
          return json(body);
        } catch (err) {
          return failure(err, 'CaptureUnavailable');
        }
      }

      case 'POST /api/motor': {
        try {
          const { prediction } = await readBody(req, motorRequestSchema);
          const label = parseLabel(prediction);
          if (!label) {
            const message = `Unknown prediction: ${prediction}. Expected "can" or "plastic"`;
            return errorResponse({ kind: 'ActuationError', message }, 400);
          }

          console.log(`[peripheral] Motor request: ${label}`);
          const command = commandFor(label, actuation);
          await lock.tryRun('motor', () => motors.activate(command));

          const body: MotorResponse = {
            status: 'success',
            message: `${displayName(label)} motor activated for ${command.durationMs / 1000}s`,
            prediction,
          };
          return json(body);
        } catch (err) {
          return failure(err, 'ActuationError');
        }
      }

      case 'GET /api/test': {
        try {
          const frame = await lock.tryRun('self-test', async () => {
            const captured = await camera.capture();
            try {
              await motors.init();
            } catch (err) {
              throw toCycleError(err, 'ActuationError');
            }
            return captured;
          });
          const body: PeripheralTestBody = {
            status: 'success',
            message: 'Camera and GPIO ready',
            camera_shape: [frame.height, frame.width, 3],
            gpio_initialized: motors.isReady,
          };
          return json(body);
        } catch (err) {
          return failure(err, 'CaptureUnavailable');
        }
      }

      default:
        return json({ status: 'error', message: `No route for ${route}` }, 404);
    }
  };
}
