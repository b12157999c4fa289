import { describe, it, expect } from 'vitest';
import { createEnvelope, EventEnvelopeSchema } from '../envelope';

describe('EventEnvelope', () => {
  it('creates a valid envelope', () => {
    const env = createEnvelope('evt-1', 'ATTACHMENT_READY', {
      aggregateType: 'user',
      aggregateId: 'user-1',
      payload: { attachmentId: 'att-1' },
      timestamp: new Date('2026-01-05T10:00:00.000Z'),
    });

    expect(env).toEqual({
      eventId: 'evt-1',
      timestamp: '2026-01-05T10:00:00.000Z',
      type: 'ATTACHMENT_READY',
      aggregateType: 'user',
      aggregateId: 'user-1',
      payload: { attachmentId: 'att-1' },
    });
    expect(EventEnvelopeSchema.safeParse(env).success).toBe(true);
  });

  it('rejects an invalid envelope', () => {
    const result = EventEnvelopeSchema.safeParse({
      eventId: '',
      timestamp: 'not-a-date',
      type: '',
    });
    expect(result.success).toBe(false);
  });
});
