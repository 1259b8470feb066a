import * as Joi from 'joi';

/**
 * Environment validation run once at startup.
 * A missing API key or a malformed value aborts the boot.
 */
export const configValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().port().default(3000),
  HOST: Joi.string().default('0.0.0.0'),
  GOOGLE_GENERATIVE_AI_API_KEY: Joi.string().required(),
  AI_MODEL: Joi.string().default('gemini-2.5-flash'),
  AI_TEMPERATURE: Joi.number().min(0).max(2).default(0.2),
  AI_MAX_OUTPUT_TOKENS: Joi.number().integer().positive().default(2000),
  AI_TIMEOUT_MS: Joi.number().integer().positive().default(30000),
  MAX_FILE_SIZE: Joi.number().integer().positive().default(10485760),
  SHORTLIST_THRESHOLD: Joi.number().integer().min(0).max(100).default(75),
  DEGRADE_ON_PARSE_ERROR: Joi.boolean().default(false),
});
