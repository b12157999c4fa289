import { jwtVerify } from 'jose';
import { type TokenVerifier } from '@appraise/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenVerifierConfig {
  keys: Array<{ kid: string; secret: string }>;
  issuer?: string;
}

/**
 * Verifies HS256 access tokens minted by the auth service. Several keys may be live at
 * once during rotation; a token's `kid` header picks the key.
 */
export class JoseTokenVerifier implements TokenVerifier {
  private readonly keys: Map<string, JwtKey>;
  private readonly issuer: string | undefined;

  constructor(config: TokenVerifierConfig) {
    if (config.keys.length === 0) {
      throw new Error('At least one JWT key is required');
    }
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }
    this.issuer = config.issuer;
  }

  async verifyAccessToken(token: string): Promise<{ userId: string }> {
    const { payload } = await jwtVerify(
      token,
      async (header) => {
        if (header.kid) {
          const key = this.keys.get(header.kid);
          if (key) return key.secret;
          throw new Error(`Unknown JWT key '${header.kid}'`);
        }
        for (const key of this.keys.values()) {
          return key.secret;
        }
        throw new Error('No valid JWT key found');
      },
      {
        issuer: this.issuer,
        algorithms: ['HS256'],
      },
    );

    if (!payload.sub) {
      throw new Error('JWT missing sub claim');
    }

    return { userId: payload.sub };
  }
}
