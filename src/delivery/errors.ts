/**
 * Request-scoped failures of audio delivery. None of these are fatal to the process;
 * the skill layer turns them into a spoken fallback.
 */

/** The engine failed or returned no usable audio. */
export class SynthesisError extends Error {
  override readonly name = "SynthesisError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type DeliveryFailureReason = "UploadFailed" | "PayloadTooLarge";

export class DeliveryError extends Error {
  override readonly name = "DeliveryError";

  constructor(
    readonly reason: DeliveryFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function isAudioDeliveryError(err: unknown): err is SynthesisError | DeliveryError {
  return err instanceof SynthesisError || err instanceof DeliveryError;
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
