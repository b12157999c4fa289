export interface OutboxPort {
  append(
    tx: unknown,
    event: {
      aggregateType: string;
      aggregateId: string;
      eventType: string;
      payload: Record<string, unknown>;
    },
  ): Promise<string>;
}

/** Verifies access tokens minted by the external auth service. */
export interface TokenVerifier {
  verifyAccessToken(token: string): Promise<{ userId: string }>;
}

export interface LoggerPort {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
}

export type WithTransaction = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
