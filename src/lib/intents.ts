import { z } from 'zod';
import type { dialogflow_v2 } from 'googleapis';

type Intent = dialogflow_v2.Schema$GoogleCloudDialogflowV2Intent;
type IntentMessage = dialogflow_v2.Schema$GoogleCloudDialogflowV2IntentMessage;
type TrainingPhrase =
  dialogflow_v2.Schema$GoogleCloudDialogflowV2IntentTrainingPhrase;

const isObject = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Anything besides the display name is forwarded as-is; Dialogflow validates it.
export const intentDefinitionSchema = z
  .object({
    display_name: z.string().min(1),
    messages: z.array(z.custom<IntentMessage>(isObject)).optional(),
    training_phrases: z.array(z.custom<TrainingPhrase>(isObject)).optional(),
  })
  .passthrough();

export type IntentDefinition = z.infer<typeof intentDefinitionSchema>;

export const intentDefinitionListSchema = z.array(intentDefinitionSchema);

const intentResourceSchema = z.custom<Intent>(isObject);

const toCamelCase = (key: string) =>
  key.replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase());

export function parseIntentDefinitions(raw: unknown): IntentDefinition[] {
  return intentDefinitionListSchema.parse(raw);
}

/**
 * Renames top-level snake_case keys to the resource's camelCase names.
 * Nested values are left untouched.
 */
export function toDialogflowIntent(definition: IntentDefinition): Intent {
  const resource: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(definition)) {
    if (value !== undefined) {
      resource[toCamelCase(key)] = value;
    }
  }

  return intentResourceSchema.parse(resource);
}
