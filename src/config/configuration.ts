import { registerAs } from '@nestjs/config';

export interface AIConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export interface UploadConfig {
  maxFileSize: number;
}

export interface ScreeningConfig {
  shortlistThreshold: number;
}

export interface FeatureFlags {
  degradeOnParseError: boolean;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  host: string;
  ai: AIConfig;
  upload: UploadConfig;
  screening: ScreeningConfig;
  featureFlags: FeatureFlags;
}

export default registerAs('app', (): AppConfig => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),
  host: process.env.HOST || '0.0.0.0',
  ai: {
    apiKey: process.env.GOOGLE_GENERATIVE_AI_API_KEY || '',
    model: process.env.AI_MODEL || 'gemini-2.5-flash',
    temperature: parseFloat(process.env.AI_TEMPERATURE || '0.2'),
    maxOutputTokens: parseInt(process.env.AI_MAX_OUTPUT_TOKENS || '2000', 10),
    timeoutMs: parseInt(process.env.AI_TIMEOUT_MS || '30000', 10),
  },
  upload: {
    maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '10485760', 10), // 10MB
  },
  screening: {
    shortlistThreshold: parseInt(process.env.SHORTLIST_THRESHOLD || '75', 10),
  },
  featureFlags: {
    degradeOnParseError:
      process.env.DEGRADE_ON_PARSE_ERROR?.toLowerCase() === 'true',
  },
}));
