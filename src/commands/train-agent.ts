import { readFile } from 'fs/promises';
import { parseIntentDefinitions } from '../lib/intents';
import type { DialogflowGateway, ServiceLogger } from '../services/dialogflow';

export const TRAIN_AGENT_USAGE = 'Usage: train-agent <intents.json>';

/**
 * Reads an intents file and hands its definitions to the trainer.
 * Returns the number of intents submitted.
 */
export async function trainFromFile(
  intentsFile: string | undefined,
  logger: ServiceLogger,
  dialogflow: DialogflowGateway
): Promise<number> {
  if (!intentsFile) {
    throw new Error(TRAIN_AGENT_USAGE);
  }

  const raw: unknown = JSON.parse(await readFile(intentsFile, 'utf-8'));
  const intents = parseIntentDefinitions(raw);
  logger.info(`Loaded ${intents.length} intents from ${intentsFile}`);

  await dialogflow.trainAgent(intents);
  logger.info('Training finished');
  return intents.length;
}
