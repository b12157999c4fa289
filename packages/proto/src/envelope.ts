import { z } from 'zod';

export const EventEnvelopeSchema = z.object({
  eventId: z.string().min(1),
  timestamp: z.string().datetime(),
  type: z.string().min(1),
  aggregateType: z.string().min(1),
  aggregateId: z.string().min(1),
  payload: z.record(z.unknown()).default({}),
});

export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;

export function createEnvelope(
  eventId: string,
  type: string,
  opts: {
    aggregateType: string;
    aggregateId: string;
    payload?: Record<string, unknown>;
    timestamp?: Date;
  },
): EventEnvelope {
  return {
    eventId,
    timestamp: (opts.timestamp ?? new Date()).toISOString(),
    type,
    aggregateType: opts.aggregateType,
    aggregateId: opts.aggregateId,
    payload: opts.payload ?? {},
  };
}
