import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { GoogleCreds } from '../src/lib/credentials';

export const testCreds: GoogleCreds = {
  type: 'service_account',
  project_id: 'test-project',
  private_key_id: 'test-key-id',
  private_key: 'test-private-key',
  client_email: 'bot@test-project.iam.gserviceaccount.com',
  client_id: '1234567890',
  auth_uri: 'https://accounts.google.com/o/oauth2/auth',
  token_uri: 'https://oauth2.googleapis.com/token',
  auth_provider_x509_cert_url: 'https://www.googleapis.com/oauth2/v1/certs',
  client_x509_cert_url:
    'https://www.googleapis.com/robot/v1/metadata/x509/bot%40test-project.iam.gserviceaccount.com',
};

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'dialogflow-gateway-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeJsonFile(
  dir: string,
  name: string,
  contents: unknown
): Promise<string> {
  const path = join(dir, name);
  await writeFile(
    path,
    typeof contents === 'string' ? contents : JSON.stringify(contents),
    'utf-8'
  );
  return path;
}

export async function writeCredentialsFile(
  dir: string,
  contents: unknown = testCreds,
  name = 'creds.json'
): Promise<string> {
  return writeJsonFile(dir, name, contents);
}
