/**
 * In-process signing keys for exercising the OAuth2 resource server in tests
 * without an authorization server.
 */
import { createLocalJWKSet, exportJWK, generateKeyPair, SignJWT, type JWTVerifyGetKey } from 'jose';
import type { OAuth2ResourceServerOptions } from '../app/middlewares/auth.js';
import { DEFAULT_TEST_AUDIENCE, DEFAULT_TEST_ISSUER, JwtTestBuilder } from './JwtTestBuilder.js';

const TEST_KEY_ID = 'test-key';
const TEST_ALGORITHM = 'RS256';

export interface TestSecurity {
  issuer: string;
  audience: string;
  keyResolver: JWTVerifyGetKey;
  /** Options to pass to registerOAuth2ResourceServer */
  resourceServerOptions: OAuth2ResourceServerOptions;
  /** Sign the builder's claims (the default token when omitted) */
  sign(builder?: JwtTestBuilder): Promise<string>;
  /** `Bearer <token>` header value */
  bearer(builder?: JwtTestBuilder): Promise<string>;
}

export async function createTestSecurity(
  options: { issuer?: string; audience?: string } = {}
): Promise<TestSecurity> {
  const issuer = options.issuer ?? DEFAULT_TEST_ISSUER;
  const audience = options.audience ?? DEFAULT_TEST_AUDIENCE;

  const { publicKey, privateKey } = await generateKeyPair(TEST_ALGORITHM);
  const jwk = await exportJWK(publicKey);
  const keyResolver = createLocalJWKSet({
    keys: [{ ...jwk, kid: TEST_KEY_ID, alg: TEST_ALGORITHM, use: 'sig' }],
  });

  const sign = async (builder: JwtTestBuilder = JwtTestBuilder.create()): Promise<string> => {
    const { header, claims } = builder.build();
    return new SignJWT(claims)
      .setProtectedHeader({ ...header, alg: TEST_ALGORITHM, kid: TEST_KEY_ID })
      .sign(privateKey);
  };

  return {
    issuer,
    audience,
    keyResolver,
    resourceServerOptions: { issuer, audience, keyResolver },
    sign,
    bearer: async (builder?: JwtTestBuilder) => `Bearer ${await sign(builder)}`,
  };
}
