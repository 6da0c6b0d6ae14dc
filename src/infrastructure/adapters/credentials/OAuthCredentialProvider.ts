import { z } from 'zod';
import { CredentialProviderPort } from '../../../application/ports/CredentialProviderPort.js';
import { AuthorizationError } from '../../../domain/errors/LedgerReportError.js';
import { Transport, TransportResponse } from '../../http/FetchTransport.js';

export const INTUIT_TOKEN_URL = 'https://oauth.platform.intuit.com/oauth2/v1/tokens/bearer';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().optional(),
});

export interface OAuthCredentials {
  clientId: string;
  clientSecret: string;
  accessToken: string;
  refreshToken: string;
  tokenUrl?: string;
}

/**
 * Holds the current access token and renews it with the refresh-token grant.
 * The ledger sources only read the token; renewal is left to the report runner.
 */
export class OAuthCredentialProvider implements CredentialProviderPort {
  private accessToken: string;
  private refreshToken: string;

  constructor(
    private readonly credentials: OAuthCredentials,
    private readonly transport: Transport,
  ) {
    this.accessToken = credentials.accessToken;
    this.refreshToken = credentials.refreshToken;
  }

  async currentCredential(): Promise<string> {
    return this.accessToken;
  }

  async refresh(): Promise<string> {
    const basic = Buffer.from(`${this.credentials.clientId}:${this.credentials.clientSecret}`).toString('base64');

    let response: TransportResponse;
    try {
      response = await this.transport({
        url: this.credentials.tokenUrl ?? INTUIT_TOKEN_URL,
        method: 'POST',
        headers: {
          Authorization: `Basic ${basic}`,
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({ grant_type: 'refresh_token', refresh_token: this.refreshToken }).toString(),
      });
    } catch (error) {
      throw new AuthorizationError(
        `Failed to refresh access token: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const parsed = TokenResponseSchema.safeParse(response.body);

    if (response.status < 200 || response.status >= 300 || !parsed.success) {
      throw new AuthorizationError(`Failed to refresh access token (status ${response.status})`, response.status);
    }

    this.accessToken = parsed.data.access_token;
    this.refreshToken = parsed.data.refresh_token ?? this.refreshToken;
    console.log('🔑 Tokens refreshed successfully.');

    return this.accessToken;
  }
}
