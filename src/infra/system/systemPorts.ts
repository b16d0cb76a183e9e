import { randomUUID } from "node:crypto";
import type {
  ClockPort,
  IdGeneratorPort,
  RunJobPayload,
  RunRequest,
  RunRequestFactoryPort,
} from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}

/**
 * Centralizes the idempotency policy for queued runs: one job per request shape
 * per hour unless forced.
 * Uses hyphen delimiters because BullMQ custom job ids cannot include colon.
 */
export class RunRequestFactory implements RunRequestFactoryPort {
  constructor(
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  create(request: RunRequest, force = false): RunJobPayload {
    const requestId = this.ids.next();
    const now = this.clock.now();
    const hourBucket = now.toISOString().slice(0, 13).replace("T", "-");
    const shape =
      request.mode === "incremental"
        ? "incremental"
        : `historical-${request.start}-${request.end}`;
    const baseKey = `${shape}-${hourBucket}`;

    return {
      requestId,
      idempotencyKey: force ? `${baseKey}-force-${requestId}` : baseKey,
      requestedAt: now.toISOString(),
      request,
    };
  }
}
