import { z } from 'zod';
import {
  CycleError,
  encodeImage,
  modelPredictResponseSchema,
  requestJson,
  toCycleError,
  type CaptureResult,
  type FetchLike,
} from '../../shared/src/index.js';

/**
 * The classifier, as far as the orchestrator is concerned: an image goes in,
 * p = P(plastic) comes out. Implementations must not have side effects.
 */
export interface InferenceEngine {
  classify(image: CaptureResult): Promise<number>;
}

export interface ModelServerOptions {
  /** REST predict endpoint, e.g. http://host:8501/v1/models/sorter:predict */
  url: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

function asClassificationError(error: unknown): CycleError {
  const cause = toCycleError(error, 'ClassificationError');
  if (cause.kind === 'ClassificationError') return cause;
  return new CycleError('ClassificationError', `Model server: ${cause.message}`, { cause });
}

/**
 * Client for a TensorFlow Serving style model server. The JPEG goes over as
 * `{ instances: [{ b64 }] }`; resizing and normalization happen in the
 * served model's own preprocessing.
 */
export class ModelServerEngine implements InferenceEngine {
  constructor(private readonly options: ModelServerOptions) {}

  async classify(image: CaptureResult): Promise<number> {
    const { url, timeoutMs, fetchImpl } = this.options;
    try {
      const body = await requestJson(url, {
        method: 'POST',
        body: { instances: [{ b64: encodeImage(image.image) }] },
        schema: modelPredictResponseSchema,
        timeoutMs,
        failureKind: 'ClassificationError',
        fetchImpl,
      });
      return body.predictions[0][0];
    } catch (err) {
      throw asClassificationError(err);
    }
  }

  /** GET the model status resource that sits next to the predict endpoint. */
  async probe(): Promise<void> {
    const { url, timeoutMs, fetchImpl } = this.options;
    try {
      await requestJson(url.replace(/:predict$/, ''), {
        schema: z.unknown(),
        timeoutMs,
        failureKind: 'ClassificationError',
        fetchImpl,
      });
    } catch (err) {
      throw asClassificationError(err);
    }
  }
}
