import { AuthorizationError } from '../../../domain/errors/LedgerReportError.js';
import { TransportRequest, TransportResponse } from '../../http/FetchTransport.js';
import { INTUIT_TOKEN_URL, OAuthCredentialProvider } from './OAuthCredentialProvider.js';

const credentials = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  accessToken: 'test-access-token',
  refreshToken: 'test-refresh-token',
};

describe('OAuthCredentialProvider', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('starts with the configured access token', async () => {
    const provider = new OAuthCredentialProvider(credentials, jest.fn());

    await expect(provider.currentCredential()).resolves.toBe('test-access-token');
  });

  test('exchanges the refresh token for new tokens', async () => {
    const transport = jest.fn<Promise<TransportResponse>, [TransportRequest]>(async () => ({
      status: 200,
      body: { access_token: 'new-access-token', refresh_token: 'new-refresh-token', expires_in: 3600 },
    }));
    const provider = new OAuthCredentialProvider(credentials, transport);

    await expect(provider.refresh()).resolves.toBe('new-access-token');
    await expect(provider.currentCredential()).resolves.toBe('new-access-token');

    const [request] = transport.mock.calls[0];
    expect(request.url).toBe(INTUIT_TOKEN_URL);
    expect(request.method).toBe('POST');
    expect(request.headers.Authorization).toBe(`Basic ${Buffer.from('test-client:test-secret').toString('base64')}`);
    expect(request.body).toBe('grant_type=refresh_token&refresh_token=test-refresh-token');

    await provider.refresh();
    expect(transport.mock.calls[1][0].body).toBe('grant_type=refresh_token&refresh_token=new-refresh-token');
  });

  test('rejects when the token endpoint refuses', async () => {
    const transport = jest.fn<Promise<TransportResponse>, [TransportRequest]>(async () => ({
      status: 400,
      body: { error: 'invalid_grant' },
    }));
    const provider = new OAuthCredentialProvider(credentials, transport);

    await expect(provider.refresh()).rejects.toThrow(
      new AuthorizationError('Failed to refresh access token (status 400)'),
    );
    await expect(provider.currentCredential()).resolves.toBe('test-access-token');
  });
});
