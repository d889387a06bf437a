import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import healthRoutes from './routes/health';
import dialogflowRoutes from './routes/dialogflow';
import { DialogflowService } from './services/dialogflow';
import { env } from './lib/env';

const app = Fastify({ logger: { level: env.LOG_LEVEL } });

async function start() {
  await app.register(cors, { origin: true, credentials: true });

  await app.register(healthRoutes, { prefix: '/health' });
  await app.register(dialogflowRoutes, {
    prefix: '/dialogflow',
    dialogflow: new DialogflowService(app.log),
  });

  await app.listen({ port: parseInt(env.PORT), host: '0.0.0.0' });
}

start().catch(err => {
  app.log.error(err);
  process.exit(1);
});
