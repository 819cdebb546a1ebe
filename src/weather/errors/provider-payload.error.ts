import { ZodError } from 'zod';

/**
 * El proveedor respondió, pero con una forma que no podemos interpretar.
 */
export class ProviderPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderPayloadError';
  }

  static fromZod(error: ZodError): ProviderPayloadError {
    const details = error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ');
    return new ProviderPayloadError(`Unexpected provider payload (${details})`);
  }
}
