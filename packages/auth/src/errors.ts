export class IdentityProviderError extends Error {
  readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'IdentityProviderError';
    this.status = options?.status;
  }
}
