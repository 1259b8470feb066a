import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AIService } from '../ai/ai.service';
import { buildScreeningPrompt } from '../ai/prompts/screening.prompt';
import { EvaluationResult } from '../ai/types/evaluation.types';
import { ResponseValidator } from '../ai/validators/response.validator';
import {
  ParseError,
  ValidationError,
} from '../common/errors/screening.errors';
import { AppConfig } from '../config/configuration';
import {
  DocumentsService,
  UploadedDocument,
} from '../documents/documents.service';
import { ScreenRequestDto } from './dto/screen-request.dto';

/** Result returned instead of a ParseError when degradation is enabled. */
export const degradedEvaluationResult = (
  reason: string,
): EvaluationResult => ({
  match_score: 0,
  skills_match_score: 0,
  experience_match_score: 0,
  mandatory_skills_present: false,
  strengths: [],
  gaps: [],
  final_recommendation: 'Reject',
  reasoning: `Automatic evaluation unavailable: ${reason}`,
});

@Injectable()
export class ScreeningService {
  private readonly logger = new Logger(ScreeningService.name);
  private readonly shortlistThreshold: number;
  private readonly degradeOnParseError: boolean;

  constructor(
    private readonly documentsService: DocumentsService,
    private readonly aiService: AIService,
    private readonly responseValidator: ResponseValidator,
    private readonly configService: ConfigService,
  ) {
    const config = this.configService.get<AppConfig>('app');

    this.shortlistThreshold = config?.screening.shortlistThreshold ?? 75;
    this.degradeOnParseError = config?.featureFlags.degradeOnParseError ?? false;
  }

  /**
   * Scores one resume against one job description.
   * The first failing stage aborts the request with its error.
   */
  async screen(
    dto: ScreenRequestDto,
    file?: UploadedDocument,
  ): Promise<EvaluationResult> {
    const jobDescription = dto.job_description.trim();
    if (!jobDescription) {
      throw new ValidationError('job_description must not be blank');
    }

    const resumeText = await this.resolveResumeText(dto.resume_text, file);

    const prompt = buildScreeningPrompt(jobDescription, resumeText, {
      shortlistThreshold: this.shortlistThreshold,
    });
    this.logger.log(
      `Screening resume (${resumeText.length} chars) against job description (${jobDescription.length} chars)`,
    );

    const reply = await this.aiService.complete(prompt);

    try {
      const result = this.responseValidator.parseEvaluation(reply, {
        shortlistThreshold: this.shortlistThreshold,
      });
      this.logger.log(
        `Screening complete: match_score=${result.match_score}, recommendation=${result.final_recommendation}`,
      );
      return result;
    } catch (error: unknown) {
      if (error instanceof ParseError && this.degradeOnParseError) {
        this.logger.warn(
          `Returning degraded result after parse failure: ${error.message}`,
        );
        return degradedEvaluationResult(error.message);
      }
      throw error;
    }
  }

  private async resolveResumeText(
    resumeText: string | undefined,
    file: UploadedDocument | undefined,
  ): Promise<string> {
    if (file) {
      return this.documentsService.extractText(file);
    }

    const text = (resumeText ?? '').trim();
    if (!text) {
      throw new ValidationError(
        'Resume content is required: provide resume_text or upload a resume file',
      );
    }
    return text;
  }
}
