import {
  type AttachmentRepository,
  type LoggerPort,
  type ReassemblyOutcome,
  type UploadOrchestrator,
  type WithTransaction,
} from '@appraise/domain';

export interface ReassemblyRecoveryDeps {
  attachmentRepo: AttachmentRepository;
  orchestrator: Pick<UploadOrchestrator, 'reassemble'>;
  withTransaction: WithTransaction;
  logger: LoggerPort;
  stuckMs: number;
  batchSize: number;
}

/**
 * Picks up uploads whose reassembly never finished, e.g. because the API process died after
 * completing them. Claiming touches updated_at, which leases the row for another stuckMs.
 */
export async function runReassemblyRecoveryJob(
  deps: ReassemblyRecoveryDeps,
): Promise<Record<ReassemblyOutcome, number>> {
  const { attachmentRepo, orchestrator, logger } = deps;
  const tally: Record<ReassemblyOutcome, number> = { ready: 0, quarantined: 0, skipped: 0, failed: 0 };

  const claimed = await deps.withTransaction((tx) =>
    attachmentRepo.claimStuckProcessing(tx, deps.stuckMs, deps.batchSize),
  );
  if (claimed.length === 0) return tally;

  logger.info({ count: claimed.length }, 'Recovering stuck reassemblies');
  for (const att of claimed) {
    const outcome = await orchestrator.reassemble(att.id);
    tally[outcome] += 1;
  }
  logger.info({ ...tally }, 'Stuck reassembly recovery finished');
  return tally;
}
