import { describe, it, expect } from 'vitest';
import { SignJWT } from 'jose';
import { JoseTokenVerifier } from '../auth/token-verifier';

const KEYS = [
  { kid: 'key-1', secret: 'test-secret-one-'.padEnd(32, '1') },
  { kid: 'key-2', secret: 'test-secret-two-'.padEnd(32, '2') },
];

async function sign(opts: { kid?: string; secret: string; sub?: string; issuer?: string }): Promise<string> {
  const jwt = new SignJWT(opts.sub ? { sub: opts.sub } : {})
    .setProtectedHeader(opts.kid ? { alg: 'HS256', kid: opts.kid } : { alg: 'HS256' })
    .setIssuedAt()
    .setExpirationTime('5m');
  if (opts.issuer) jwt.setIssuer(opts.issuer);
  return jwt.sign(new TextEncoder().encode(opts.secret));
}

describe('JoseTokenVerifier', () => {
  it('returns the subject as the user id', async () => {
    const verifier = new JoseTokenVerifier({ keys: KEYS });
    const token = await sign({ kid: 'key-2', secret: KEYS[1].secret, sub: 'user-42' });

    expect(await verifier.verifyAccessToken(token)).toEqual({ userId: 'user-42' });
  });

  it('rejects an unknown kid', async () => {
    const verifier = new JoseTokenVerifier({ keys: KEYS });
    const token = await sign({ kid: 'key-9', secret: KEYS[0].secret, sub: 'user-42' });

    await expect(verifier.verifyAccessToken(token)).rejects.toThrow("Unknown JWT key 'key-9'");
  });

  it('rejects a token signed with another secret', async () => {
    const verifier = new JoseTokenVerifier({ keys: KEYS });
    const token = await sign({ kid: 'key-1', secret: KEYS[1].secret, sub: 'user-42' });

    await expect(verifier.verifyAccessToken(token)).rejects.toThrow();
  });

  it('rejects a token without sub', async () => {
    const verifier = new JoseTokenVerifier({ keys: KEYS });
    const token = await sign({ kid: 'key-1', secret: KEYS[0].secret });

    await expect(verifier.verifyAccessToken(token)).rejects.toThrow('JWT missing sub claim');
  });

  it('checks the issuer when configured', async () => {
    const verifier = new JoseTokenVerifier({ keys: KEYS, issuer: 'auth-service' });
    const good = await sign({ kid: 'key-1', secret: KEYS[0].secret, sub: 'u', issuer: 'auth-service' });
    const bad = await sign({ kid: 'key-1', secret: KEYS[0].secret, sub: 'u', issuer: 'someone-else' });

    expect(await verifier.verifyAccessToken(good)).toEqual({ userId: 'u' });
    await expect(verifier.verifyAccessToken(bad)).rejects.toThrow();
  });
});
