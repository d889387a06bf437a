import { google, type dialogflow_v2 } from 'googleapis';
import { GaxiosError } from 'gaxios';
import type { FastifyBaseLogger } from 'fastify';
import { env } from '../lib/env';
import { loadCredentials, type GoogleCreds } from '../lib/credentials';
import { toDialogflowIntent, type IntentDefinition } from '../lib/intents';

export const DIALOGFLOW_SCOPES = [
  'https://www.googleapis.com/auth/cloud-platform',
  'https://www.googleapis.com/auth/dialogflow',
];

export type ServiceLogger = Pick<FastifyBaseLogger, 'info' | 'error'>;

export interface DialogflowResponse {
  text: string;
  isFallback: boolean;
}

export interface DialogflowGateway {
  getResponse(
    sessionId: string,
    text: string,
    languageCode: string
  ): Promise<DialogflowResponse>;
  trainAgent(intents: readonly IntentDefinition[]): Promise<void>;
}

export interface DialogflowServiceOptions {
  credentialsFile?: string;
  // Rethrow the first failed intent instead of moving on to the next one.
  stopOnFirstError?: boolean;
}

export const projectPath = (projectId: string) => `projects/${projectId}`;

export const agentPath = (projectId: string) =>
  `${projectPath(projectId)}/agent`;

export const sessionPath = (projectId: string, sessionId: string) =>
  `${agentPath(projectId)}/sessions/${sessionId}`;

export function isRemoteServiceError(error: unknown): error is GaxiosError {
  return error instanceof GaxiosError;
}

export class DialogflowService implements DialogflowGateway {
  private logger: ServiceLogger;
  private credentialsFile: string;
  private stopOnFirstError: boolean;

  constructor(logger: ServiceLogger, options: DialogflowServiceOptions = {}) {
    this.logger = logger;
    this.credentialsFile = options.credentialsFile ?? env.GOOGLE_APP_CREDS_FILE;
    this.stopOnFirstError =
      options.stopOnFirstError ?? env.TRAIN_STOP_ON_FIRST_ERROR;
  }

  // Dialogflow client authorised with the service-account key
  private createDialogflowClient(creds: GoogleCreds) {
    const auth = new google.auth.JWT({
      email: creds.client_email,
      key: creds.private_key,
      keyId: creds.private_key_id,
      scopes: DIALOGFLOW_SCOPES,
    });

    return google.dialogflow({ version: 'v2', auth });
  }

  async getResponse(
    sessionId: string,
    text: string,
    languageCode: string
  ): Promise<DialogflowResponse> {
    const creds = await loadCredentials(this.credentialsFile);
    const dialogflow = this.createDialogflowClient(creds);
    const session = sessionPath(creds.project_id, sessionId);

    this.logger.info(
      `Session ${sessionId} with language code ${languageCode}`
    );

    const response = await dialogflow.projects.agent.sessions.detectIntent({
      session,
      requestBody: {
        queryInput: { text: { text, languageCode } },
      },
    });

    // Default-valued fields are left out of the JSON reply
    const queryResult: dialogflow_v2.Schema$GoogleCloudDialogflowV2QueryResult =
      response.data.queryResult ?? {};

    this.logger.info(
      `Query text: ${queryResult.queryText ?? ''}, ` +
        `Detected intent: ${queryResult.intent?.displayName ?? ''}, ` +
        `Confidence: ${queryResult.intentDetectionConfidence ?? 0}, ` +
        `Fulfillment text: ${queryResult.fulfillmentText ?? ''}`
    );

    return {
      text: queryResult.fulfillmentText ?? '',
      isFallback: queryResult.intent?.isFallback ?? false,
    };
  }

  /**
   * Creates the intents one by one and retrains the whole agent after each
   * successful creation. A Dialogflow error on one intent is logged and the
   * loop moves on, unless `stopOnFirstError` is set.
   */
  async trainAgent(intents: readonly IntentDefinition[]): Promise<void> {
    const creds = await loadCredentials(this.credentialsFile);
    const dialogflow = this.createDialogflowClient(creds);
    const parent = agentPath(creds.project_id);

    for (const intent of intents) {
      try {
        await dialogflow.projects.agent.intents.create({
          parent,
          requestBody: toDialogflowIntent(intent),
        });
        this.logger.info(`Intent "${intent.display_name}" created`);

        await dialogflow.projects.agent.train({
          parent: projectPath(creds.project_id),
        });
        this.logger.info(`Intent "${intent.display_name}" trained`);
      } catch (error) {
        if (!isRemoteServiceError(error)) {
          throw error;
        }
        this.logger.error(
          { err: error },
          `Intent "${intent.display_name}" was not created`
        );
        if (this.stopOnFirstError) {
          throw error;
        }
      }
    }
  }
}
