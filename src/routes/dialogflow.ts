import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { env } from '../lib/env';
import { intentDefinitionListSchema } from '../lib/intents';
import {
  isRemoteServiceError,
  type DialogflowGateway,
} from '../services/dialogflow';

export interface DialogflowRoutesOptions {
  dialogflow: DialogflowGateway;
}

// Dialogflow caps session ids at 36 characters; a slash would leave the session path
const sessionParams = z.object({
  sessionId: z
    .string()
    .min(1)
    .max(36)
    .regex(/^[^/]+$/),
});

const detectIntentBody = z.object({
  text: z.string().min(1),
  languageCode: z.string().min(1).optional(),
});

const trainAgentBody = z.object({
  intents: intentDefinitionListSchema,
});

const failureStatus = (err: unknown) => (isRemoteServiceError(err) ? 502 : 500);

const routes: FastifyPluginAsync<DialogflowRoutesOptions> = async (
  app,
  options
) => {
  const { dialogflow } = options;

  app.post<{ Params: { sessionId: string } }>(
    '/sessions/:sessionId/detect-intent',
    async (req, reply) => {
      const params = sessionParams.safeParse(req.params);
      if (!params.success) {
        return reply.code(400).send({
          error: 'Invalid session id',
          issues: params.error.issues,
        });
      }

      const body = detectIntentBody.safeParse(req.body);
      if (!body.success) {
        return reply.code(400).send({
          error: 'Invalid request body',
          issues: body.error.issues,
        });
      }

      const { text, languageCode } = body.data;
      try {
        return await dialogflow.getResponse(
          params.data.sessionId,
          text,
          languageCode ?? env.DIALOGFLOW_LANGUAGE_CODE
        );
      } catch (err) {
        req.log.error({ err }, 'Failed to detect intent');
        return reply
          .code(failureStatus(err))
          .send({ error: 'Intent detection failed' });
      }
    }
  );

  app.post('/agent/train', async (req, reply) => {
    const body = trainAgentBody.safeParse(req.body);
    if (!body.success) {
      return reply.code(400).send({
        error: 'Invalid request body',
        issues: body.error.issues,
      });
    }

    const { intents } = body.data;
    try {
      await dialogflow.trainAgent(intents);
      return { submitted: intents.length };
    } catch (err) {
      req.log.error({ err }, 'Failed to train agent');
      return reply
        .code(failureStatus(err))
        .send({ error: 'Agent training failed' });
    }
  });
};

export default routes;
