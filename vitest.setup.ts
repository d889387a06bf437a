// Global test env bootstrap to satisfy zod env schema before module imports
process.env.GOOGLE_APP_CREDS_FILE =
  process.env.GOOGLE_APP_CREDS_FILE || '/tmp/test-google-creds.json';
process.env.DIALOGFLOW_LANGUAGE_CODE = 'en';
process.env.TRAIN_STOP_ON_FIRST_ERROR = 'false';
