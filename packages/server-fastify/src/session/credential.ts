import { HTTP_BAD_GATEWAY } from '#constants/http';
import { MS_PER_SECOND } from '#constants/time';
import { UpstreamExchangeError } from '#errors';

import type { StoredCredential } from '@credgate/credential-store';

import type {
  ProviderTokenResponseWire,
  RealClientCredentials,
} from '#oauth/proxy/types';

/** context needed to turn a provider response into a stored credential */
export interface CredentialSource {
  /** provider token endpoint the credential refreshes against */
  tokenUri: string;
  /** credentials the provider issued the tokens to */
  client: RealClientCredentials;
  /** epoch milliseconds the response was received at */
  receivedAt: number;
  /** credential being refreshed, whose values carry over when the response omits them */
  previous?: StoredCredential;
  /** scope that was requested, used when the response does not echo one */
  requestedScope?: string;
}

/**
 * builds the stored form of a provider token response
 * @param tokens provider token response
 * @param source issuing context
 * @returns credential to persist
 * @throws {UpstreamExchangeError} when the response carries no access token
 */
export function toStoredCredential(
  tokens: ProviderTokenResponseWire,
  source: CredentialSource,
): StoredCredential {
  const { access_token, refresh_token, expires_in, scope } = tokens;
  if (typeof access_token !== 'string' || access_token === '') {
    throw new UpstreamExchangeError({
      message: 'provider token response has no access_token',
      statusCode: HTTP_BAD_GATEWAY,
      payload: {
        error: 'server_error',
        error_description: 'the provider returned no access token',
      },
    });
  }

  const scopeText = typeof scope === 'string' ? scope : source.requestedScope;
  const expiresAt =
    typeof expires_in === 'number'
      ? source.receivedAt + expires_in * MS_PER_SECOND
      : source.previous?.expiresAt;

  return {
    token: access_token,
    refreshToken:
      typeof refresh_token === 'string'
        ? refresh_token
        : source.previous?.refreshToken,
    tokenUri: source.tokenUri,
    clientId: source.client.clientId,
    clientSecret: source.client.clientSecret,
    scopes: scopeText
      ? scopeText.split(' ').filter((item) => item !== '')
      : (source.previous?.scopes ?? []),
    expiresAt,
  };
}
