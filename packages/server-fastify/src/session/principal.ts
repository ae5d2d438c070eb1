import { isJsonObject, jsonifyError, parseJson } from '@credgate/core';
import { decodeJwt } from 'jose';

import type { Log } from '@credgate/core';

import type { ProviderTokenResponseWire } from '#oauth/proxy/types';

/** where to look for the identity behind a token response */
export interface PrincipalLookupOptions {
  /** provider userinfo endpoint, queried when there is no id_token */
  userinfoEndpoint?: string;
  /** milliseconds before the userinfo call is abandoned */
  timeoutMs: number;
  log?: Log;
}

/**
 * finds the principal a provider token response was issued for
 * the id_token is only decoded: it arrives straight from the provider's token endpoint
 * @param tokens provider token response
 * @param options lookup options
 * @returns email, else subject, or undefined when no identity is available
 */
export async function resolvePrincipal(
  tokens: ProviderTokenResponseWire,
  options: PrincipalLookupOptions,
): Promise<string | undefined> {
  const { id_token, access_token } = tokens;
  const { userinfoEndpoint, timeoutMs, log } = options;

  if (typeof id_token === 'string') {
    try {
      const claims = decodeJwt(id_token);
      const principal = pickIdentity(claims.email, claims.sub);
      if (principal) {
        return principal;
      }
    } catch (error) {
      log?.('warn', 'provider id_token could not be decoded', {
        error: jsonifyError(error),
      });
    }
  }

  if (!userinfoEndpoint || typeof access_token !== 'string') {
    return undefined;
  }

  try {
    const response = await fetch(userinfoEndpoint, {
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${access_token}`,
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = parseJson(await response.text());
    if (!response.ok || !isJsonObject(body)) {
      log?.('warn', 'provider userinfo request failed', {
        status: response.status,
      });

      return undefined;
    }

    return pickIdentity(body.email, body.sub);
  } catch (error) {
    log?.('warn', 'provider userinfo request failed', {
      error: jsonifyError(error),
    });

    return undefined;
  }
}

/**
 * picks the first usable identity claim
 * @param email email claim
 * @param subject subject claim
 * @returns the identity or undefined
 */
function pickIdentity(
  email: unknown,
  subject: unknown,
): string | undefined {
  if (typeof email === 'string' && email.trim() !== '') {
    return email;
  }

  return typeof subject === 'string' && subject.trim() !== ''
    ? subject
    : undefined;
}
