import { readFile } from 'fs/promises';
import { z } from 'zod';

export const googleCredsSchema = z.object({
  type: z.string(),
  project_id: z.string(),
  private_key_id: z.string(),
  private_key: z.string(),
  client_email: z.string(),
  client_id: z.string(),
  auth_uri: z.string(),
  token_uri: z.string(),
  auth_provider_x509_cert_url: z.string(),
  client_x509_cert_url: z.string(),
});

export type GoogleCreds = z.infer<typeof googleCredsSchema>;

export type CredentialsErrorReason =
  | 'CREDENTIALS_READ_ERROR'
  | 'CREDENTIALS_PARSE_ERROR';

export class CredentialsError extends Error {
  readonly reason: CredentialsErrorReason;

  constructor(
    message: string,
    reason: CredentialsErrorReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CredentialsError';
    this.reason = reason;
  }
}

/**
 * Reads a service-account key file and validates its field set.
 * The file is read on every call; nothing is cached.
 */
export async function loadCredentials(path: string): Promise<GoogleCreds> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf-8');
  } catch (error) {
    throw new CredentialsError(
      `Failed to read credentials file ${path}: ${String(error)}`,
      'CREDENTIALS_READ_ERROR',
      { cause: error }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new CredentialsError(
      `Credentials file ${path} is not valid JSON: ${String(error)}`,
      'CREDENTIALS_PARSE_ERROR',
      { cause: error }
    );
  }

  const parsed = googleCredsSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map(issue => issue.path.join('.') || '(root)')
      .join(', ');
    throw new CredentialsError(
      `Credentials file ${path} has missing or invalid fields: ${fields}`,
      'CREDENTIALS_PARSE_ERROR',
      { cause: parsed.error }
    );
  }

  return parsed.data;
}
