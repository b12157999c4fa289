export { EventEnvelopeSchema, createEnvelope, type EventEnvelope } from './envelope';
export { NatsSubjects, resolveOutboxSubject, type AggregateType } from './subjects';
export * from './api/attachment';
