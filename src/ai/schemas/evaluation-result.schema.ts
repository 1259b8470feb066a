import { z } from 'zod';
import { RECOMMENDATIONS } from '../types/evaluation.types';

const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;

/**
 * 0-100 score. Numeric strings are accepted; the value is rounded and
 * clamped into range.
 */
const scoreSchema = z
  .union([
    z.number().finite(),
    z
      .string()
      .trim()
      .regex(NUMERIC_STRING, 'Expected a numeric score')
      .transform(Number),
  ])
  .transform((value) => Math.max(0, Math.min(100, Math.round(value))));

const flagSchema = z.union([
  z.boolean(),
  z
    .enum(['true', 'false'])
    .transform((value) => value === 'true'),
]);

const recommendationSchema = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? RECOMMENDATIONS.find(
          (option) => option.toLowerCase() === value.trim().toLowerCase(),
        ) ?? value
      : value,
  z.enum(RECOMMENDATIONS),
);

const itemsSchema = z
  .array(z.string())
  .transform((items) =>
    items.map((item) => item.trim()).filter((item) => item.length > 0),
  );

/**
 * Zod schema for the model's screening reply
 */
export const evaluationResultSchema = z.object({
  match_score: scoreSchema,
  skills_match_score: scoreSchema,
  experience_match_score: scoreSchema,
  mandatory_skills_present: flagSchema,
  strengths: itemsSchema,
  gaps: itemsSchema,
  final_recommendation: recommendationSchema,
  reasoning: z.string(),
});
