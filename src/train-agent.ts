import 'dotenv/config';
import { pino } from 'pino';
import { env } from './lib/env';
import { trainFromFile } from './commands/train-agent';
import { DialogflowService } from './services/dialogflow';

const logger = pino({ level: env.LOG_LEVEL });

trainFromFile(process.argv[2], logger, new DialogflowService(logger)).catch(
  err => {
    logger.error({ err }, 'Agent training failed');
    process.exit(1);
  }
);
