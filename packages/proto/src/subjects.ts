export const NatsSubjects = {
  userEvents: (userId: string) => `user.${userId}.events`,

  allUserEvents: 'user.*.events',
} as const;

export type AggregateType = 'user';

export function resolveOutboxSubject(aggregateType: string, aggregateId: string, eventType: string): string {
  if (aggregateType === 'user') {
    return NatsSubjects.userEvents(aggregateId);
  }
  return `${aggregateType}.${aggregateId}.${eventType}`;
}
