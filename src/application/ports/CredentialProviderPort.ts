export interface CredentialProviderPort {
  currentCredential(): Promise<string>;
  /** Rejects with AuthorizationError when the credential cannot be renewed. */
  refresh(): Promise<string>;
}
