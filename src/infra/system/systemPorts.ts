import { randomUUID } from "node:crypto";
import type { ClockPort, IdGeneratorPort } from "../../core/ports/outboundPorts";

/**
 * Wall-clock access behind a port so time-sensitive logic stays deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Random identifiers for stored audio files.
 */
export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
