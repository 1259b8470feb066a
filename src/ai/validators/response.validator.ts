import { Injectable, Logger } from '@nestjs/common';
import { ParseError } from '../../common/errors/screening.errors';
import { DEFAULT_SHORTLIST_THRESHOLD } from '../prompts/screening.prompt';
import { evaluationResultSchema } from '../schemas/evaluation-result.schema';
import { EvaluationResult } from '../types/evaluation.types';

export interface ParseEvaluationOptions {
  shortlistThreshold?: number;
}

const PREVIEW_LENGTH = 200;

/**
 * Index of the brace closing the object opened at `start`, skipping braces
 * inside string literals. An unterminated object runs to the end of `text`.
 */
const findObjectEnd = (text: string, start: number): number => {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}' && --depth === 0) return i;
  }
  return text.length - 1;
};

@Injectable()
export class ResponseValidator {
  private readonly logger = new Logger(ResponseValidator.name);

  /**
   * Turns the model's raw reply into an {@link EvaluationResult}.
   *
   * A `Shortlist` answer is downgraded to `Reject` when mandatory skills are
   * missing or the match score is below the shortlist threshold.
   *
   * @throws ParseError when the reply holds no JSON object or the object
   * does not match the evaluation schema
   */
  parseEvaluation(
    reply: string,
    options: ParseEvaluationOptions = {},
  ): EvaluationResult {
    const threshold = options.shortlistThreshold ?? DEFAULT_SHORTLIST_THRESHOLD;
    const parsed = evaluationResultSchema.safeParse(this.extractJson(reply));

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      this.logger.warn(`Model reply failed schema validation: ${issues}`);
      throw new ParseError(
        `Model reply does not match the evaluation schema: ${issues}`,
      );
    }

    const result = parsed.data;
    const gated =
      result.final_recommendation === 'Shortlist' &&
      (!result.mandatory_skills_present || result.match_score < threshold);

    if (gated) {
      this.logger.log(
        `Downgrading Shortlist to Reject (mandatory_skills_present=${result.mandatory_skills_present}, match_score=${result.match_score})`,
      );
    }

    return {
      match_score: result.match_score,
      skills_match_score: result.skills_match_score,
      experience_match_score: result.experience_match_score,
      mandatory_skills_present: result.mandatory_skills_present,
      strengths: result.strengths,
      gaps: result.gaps,
      final_recommendation: gated ? 'Reject' : result.final_recommendation,
      reasoning: result.reasoning,
    };
  }

  /**
   * Pulls the first top-level JSON object out of a reply that may be
   * wrapped in markdown fences or surrounded by prose.
   */
  extractJson(reply: string): unknown {
    const cleaned = reply
      .trim()
      .replace(/^```json\s*/i, '')
      .replace(/^```\s*/i, '')
      .replace(/\s*```$/i, '')
      .trim();

    const jsonStart = cleaned.indexOf('{');
    const jsonEnd =
      jsonStart === -1 ? -1 : findObjectEnd(cleaned, jsonStart) + 1;

    if (jsonStart === -1 || jsonEnd <= jsonStart) {
      this.logger.warn(
        `No JSON object found in model reply: ${reply.substring(0, PREVIEW_LENGTH)}`,
      );
      throw new ParseError('No JSON object found in model reply');
    }

    const candidate = cleaned.substring(jsonStart, jsonEnd);

    try {
      return JSON.parse(candidate);
    } catch (parseError) {
      // Trailing commas are the most common defect in model-written JSON
      try {
        return JSON.parse(candidate.replace(/,(\s*[}\]])/g, '$1'));
      } catch {
        const message =
          parseError instanceof Error ? parseError.message : String(parseError);
        this.logger.warn(
          `Invalid JSON in model reply (${message}): ${reply.substring(0, PREVIEW_LENGTH)}`,
        );
        throw new ParseError(`Invalid JSON in model reply: ${message}`);
      }
    }
  }
}
