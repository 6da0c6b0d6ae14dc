import { CredentialProviderPort } from '../../../application/ports/CredentialProviderPort.js';
import { AuthorizationError } from '../../../domain/errors/LedgerReportError.js';

/** A fixed bearer token that cannot be renewed. */
export class StaticCredentialProvider implements CredentialProviderPort {
  constructor(private readonly token: string) {}

  async currentCredential(): Promise<string> {
    return this.token;
  }

  async refresh(): Promise<string> {
    throw new AuthorizationError('Static credential cannot be refreshed');
  }
}
