import { type OrphanReaper } from '@appraise/domain';

const MAX_BATCHES_PER_RUN = 20;

/** Sweeps batch after batch until one comes back short, so a backlog drains within one run. */
export async function runOrphanSweepJob(reaper: OrphanReaper, batchSize: number): Promise<number> {
  let total = 0;
  for (let batch = 0; batch < MAX_BATCHES_PER_RUN; batch++) {
    const count = await reaper.sweep();
    total += count;
    if (count < batchSize) break;
  }
  return total;
}
