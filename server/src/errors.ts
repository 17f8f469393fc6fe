import type { ChannelName } from "./model";

/** Malformed or out-of-range command parameters. */
export class ValidationError extends Error {
  override name = "ValidationError";
}

/** Command shape is fine but the current drone state forbids it. */
export class PreconditionError extends Error {
  override name = "PreconditionError";
}

/** The hardware adapter is running on synthetic data. */
export class HardwareDegradedError extends Error {
  override name = "HardwareDegradedError";
}

export class DeliveryError extends Error {
  override name = "DeliveryError";

  constructor(
    readonly clientId: string,
    readonly channel: ChannelName,
    cause: unknown,
  ) {
    super(`Delivery to ${clientId} on ${channel} failed: ${describe(cause)}`, {
      cause,
    });
  }
}

/** Lock not acquired within its bound. Always fatal. */
export class DeadlockError extends Error {
  override name = "DeadlockError";
}

export type CommandError = ValidationError | PreconditionError;

export const describe = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
