import { configValidationSchema } from './config.schema';

describe('configValidationSchema', () => {
  const validate = (env: Record<string, string>) =>
    configValidationSchema.validate(env, { allowUnknown: true, abortEarly: true });

  it('requires the AI service API key', () => {
    const { error } = validate({});

    expect(error?.message).toBe('"GOOGLE_GENERATIVE_AI_API_KEY" is required');
  });

  it('applies defaults', () => {
    const { error, value } = validate({ GOOGLE_GENERATIVE_AI_API_KEY: 'test-key' });

    expect(error).toBeUndefined();
    expect(value).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      AI_MODEL: 'gemini-2.5-flash',
      AI_TEMPERATURE: 0.2,
      AI_TIMEOUT_MS: 30000,
      MAX_FILE_SIZE: 10485760,
      SHORTLIST_THRESHOLD: 75,
      DEGRADE_ON_PARSE_ERROR: false,
    });
  });

  it('converts numeric and boolean strings', () => {
    const { value } = validate({
      GOOGLE_GENERATIVE_AI_API_KEY: 'test-key',
      AI_TIMEOUT_MS: '5000',
      DEGRADE_ON_PARSE_ERROR: 'true',
    });

    expect(value).toMatchObject({
      AI_TIMEOUT_MS: 5000,
      DEGRADE_ON_PARSE_ERROR: true,
    });
  });

  it('rejects an out-of-range shortlist threshold', () => {
    const { error } = validate({
      GOOGLE_GENERATIVE_AI_API_KEY: 'test-key',
      SHORTLIST_THRESHOLD: '150',
    });

    expect(error?.message).toBe(
      '"SHORTLIST_THRESHOLD" must be less than or equal to 100',
    );
  });
});
