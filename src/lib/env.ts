import { z } from 'zod';

export const envSchema = z.object({
  GOOGLE_APP_CREDS_FILE: z.string().min(1),
  DIALOGFLOW_LANGUAGE_CODE: z.string().default('ru'),
  TRAIN_STOP_ON_FIRST_ERROR: z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true'),
  PORT: z.string().default('4000'),
  LOG_LEVEL: z.string().default('info'),
});

export const env = envSchema.parse(process.env);
