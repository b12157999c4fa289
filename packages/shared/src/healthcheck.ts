import { writeFile } from 'node:fs/promises';
import { errorMessage } from '@appraise/domain';
import { type SafeLogger } from './logger';

const DEFAULT_PATH = '/tmp/.worker-healthy';

export async function touchHealthFile(path: string = DEFAULT_PATH): Promise<void> {
  await writeFile(path, new Date().toISOString(), 'utf-8');
}

export function startHealthBeat(
  logger: SafeLogger,
  intervalMs: number = 5000,
  path: string = DEFAULT_PATH,
): { stop: () => void } {
  const tick = () => {
    touchHealthFile(path).catch((err: unknown) => {
      logger.warn({ path, err: errorMessage(err) }, 'Health beat write failed');
    });
  };
  tick();
  const timer = setInterval(tick, intervalMs);
  return {
    stop: () => clearInterval(timer),
  };
}
