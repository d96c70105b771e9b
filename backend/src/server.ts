import {
  CycleError,
  classifyRequestSchema,
  cycleRequestSchema,
  displayName,
  errorResponse,
  json,
  preflight,
  readBody,
  roundConfidence,
  type ClassifyResponse,
  type FrameConfig,
  type Handler,
  type Scores,
} from '../../shared/src/index.js';
import type { CycleOutcome, SessionController } from './controller.js';
import { UploadedImage } from './upload.js';

export interface SessionServiceOptions {
  controller: SessionController;
  frame: FrameConfig;
  /** Peripheral used by /api/cycle when the body names none */
  defaultPeripheral: string;
}

function outcomeResponse(outcome: CycleOutcome, extra: Record<string, unknown> = {}): Response {
  if (!outcome.success) return errorResponse(outcome.error);

  const body: ClassifyResponse = {
    status: 'success',
    prediction: displayName(outcome.classification.label),
    confidence: roundConfidence(outcome.classification.confidence),
    can_count: outcome.counts.can,
    plastic_count: outcome.counts.plastic,
  };
  return json({ ...body, ...extra });
}

/** HTTP surface of the inference/session node. */
export function createSessionHandler(options: SessionServiceOptions): Handler {
  const { controller, frame, defaultPeripheral } = options;

  return async (req: Request) => {
    if (req.method === 'OPTIONS') return preflight();

    const { pathname } = new URL(req.url);
    const route = `${req.method} ${pathname}`;

    try {
      switch (route) {
        case 'GET /api/status': {
          const session = controller.status();
          return json({
            status: 'online',
            message: 'Inference service is ready',
            session_status: session.status,
          });
        }

        case 'POST /api/classify': {
          const { image } = await readBody(req, classifyRequestSchema);
          return outcomeResponse(await controller.classifyImage(new UploadedImage(image, frame)));
        }

        case 'POST /api/cycle': {
          const { peripheral = defaultPeripheral } = await readBody(req, cycleRequestSchema);
          return outcomeResponse(await controller.runCycle(peripheral), { peripheral });
        }

        case 'POST /api/start': {
          const session = controller.start();
          return json({
            status: 'success',
            message: 'Session started',
            data: { can_count: session.counts.can, plastic_count: session.counts.plastic, is_active: true },
          });
        }

        case 'POST /api/stop': {
          const session = controller.stop();
          return json({
            status: 'success',
            message: 'Session stopped',
            final_scores: { can_count: session.counts.can, plastic_count: session.counts.plastic },
          });
        }

        case 'GET /api/scores': {
          const session = controller.status();
          const scores: Scores = {
            can_count: session.counts.can,
            plastic_count: session.counts.plastic,
            is_active: session.status === 'running',
          };
          return json(scores);
        }

        default:
          return json({ status: 'error', message: `No route for ${route}` }, 404);
      }
    } catch (err) {
      if (err instanceof CycleError) return errorResponse(err.toFailure());
      console.error('[session] Request failed:', err);
      return json({ status: 'error', message: err instanceof Error ? err.message : 'Internal server error' }, 500);
    }
  };
}
