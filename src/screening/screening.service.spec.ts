import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { LANGUAGE_MODEL } from '../ai/ai.constants';
import { AIService } from '../ai/ai.service';
import { ResponseValidator } from '../ai/validators/response.validator';
import {
  ExtractionError,
  ParseError,
  ValidationError,
} from '../common/errors/screening.errors';
import { AppConfig } from '../config/configuration';
import { DocumentsService } from '../documents/documents.service';
import {
  buildAppConfig,
  buildConfigService,
} from '../../test/fixtures/app-config';
import {
  JOB_DESCRIPTION,
  MISSING_KUBERNETES_REPLY,
  RESUME_TEXT,
  STRONG_MATCH_REPLY,
} from '../../test/fixtures/evaluation-replies';
import { FakeLanguageModel } from '../../test/fakes/fake-language-model';
import { ScreenRequestDto } from './dto/screen-request.dto';
import { ScreeningService } from './screening.service';

describe('ScreeningService', () => {
  let model: FakeLanguageModel;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  const createService = async (overrides: Partial<AppConfig> = {}) => {
    model = new FakeLanguageModel();
    const moduleRef = await Test.createTestingModule({
      providers: [
        ScreeningService,
        AIService,
        ResponseValidator,
        DocumentsService,
        { provide: LANGUAGE_MODEL, useValue: model },
        { provide: ConfigService, useValue: buildConfigService(overrides) },
      ],
    }).compile();

    return moduleRef.get(ScreeningService);
  };

  describe('with default policy', () => {
    let service: ScreeningService;

    beforeEach(async () => {
      service = await createService();
    });

    it('rejects a resume missing a mandatory skill', async () => {
      model.replyWith(MISSING_KUBERNETES_REPLY);

      const result = await service.screen({
        job_description: JOB_DESCRIPTION,
        resume_text: RESUME_TEXT,
      });

      expect(result).toEqual({
        match_score: 62,
        skills_match_score: 70,
        experience_match_score: 80,
        mandatory_skills_present: false,
        strengths: ['5 years of Python', 'FastAPI', 'AWS'],
        gaps: ['No Kubernetes experience'],
        final_recommendation: 'Reject',
        reasoning:
          'Strong Python and AWS background, but Kubernetes is a mandatory requirement and is missing.',
      });
    });

    it('sends both documents to the model in one call', async () => {
      model.replyWith(STRONG_MATCH_REPLY);

      await service.screen({
        job_description: `  ${JOB_DESCRIPTION}\n`,
        resume_text: RESUME_TEXT,
      });

      expect(model.calls).toHaveLength(1);
      const prompt = model.lastPromptText();
      expect(prompt).toContain(`JOB DESCRIPTION:\n"""\n${JOB_DESCRIPTION}\n"""`);
      expect(prompt).toContain(`RESUME:\n"""\n${RESUME_TEXT}\n"""`);
    });

    it('prefers an uploaded file over resume_text', async () => {
      model.replyWith(STRONG_MATCH_REPLY);

      await service.screen(
        { job_description: JOB_DESCRIPTION, resume_text: 'ignored text' },
        {
          originalname: 'resume.txt',
          mimetype: 'text/plain',
          buffer: Buffer.from('Jane Roe\nKubernetes administrator'),
        },
      );

      expect(model.lastPromptText()).toContain(
        'RESUME:\n"""\nJane Roe\nKubernetes administrator\n"""',
      );
      expect(model.lastPromptText()).not.toContain('ignored text');
    });

    it.each<[string, ScreenRequestDto]>([
      ['a blank job description', { job_description: '   ', resume_text: RESUME_TEXT }],
      ['an empty resume', { job_description: JOB_DESCRIPTION, resume_text: '' }],
      ['no resume at all', { job_description: JOB_DESCRIPTION }],
    ])('fails with ValidationError for %s', async (_, dto) => {
      await expect(service.screen(dto)).rejects.toBeInstanceOf(ValidationError);
      expect(model.calls).toHaveLength(0);
    });

    it('does not call the model when extraction fails', async () => {
      await expect(
        service.screen(
          { job_description: JOB_DESCRIPTION },
          {
            originalname: 'photo.png',
            mimetype: 'image/png',
            buffer: Buffer.from('png'),
          },
        ),
      ).rejects.toBeInstanceOf(ExtractionError);
      expect(model.calls).toHaveLength(0);
    });

    it('propagates ParseError for an unparseable reply', async () => {
      model.replyWith('Sorry, I cannot help with that.');

      await expect(
        service.screen({
          job_description: JOB_DESCRIPTION,
          resume_text: RESUME_TEXT,
        }),
      ).rejects.toBeInstanceOf(ParseError);
    });
  });

  describe('with degradation on parse failure', () => {
    it('returns the default result instead of a ParseError', async () => {
      const service = await createService({
        featureFlags: { degradeOnParseError: true },
      });
      model.replyWith('Sorry, I cannot help with that.');

      const result = await service.screen({
        job_description: JOB_DESCRIPTION,
        resume_text: RESUME_TEXT,
      });

      expect(result).toEqual({
        match_score: 0,
        skills_match_score: 0,
        experience_match_score: 0,
        mandatory_skills_present: false,
        strengths: [],
        gaps: [],
        final_recommendation: 'Reject',
        reasoning:
          'Automatic evaluation unavailable: No JSON object found in model reply',
      });
    });
  });

  describe('with a custom shortlist threshold', () => {
    it('passes the threshold to the prompt and the gate', async () => {
      const service = await createService({
        screening: { ...buildAppConfig().screening, shortlistThreshold: 90 },
      });
      model.replyWith(STRONG_MATCH_REPLY);

      const result = await service.screen({
        job_description: JOB_DESCRIPTION,
        resume_text: RESUME_TEXT,
      });

      expect(model.lastPromptText()).toContain('match_score >= 90');
      expect(result.final_recommendation).toBe('Reject');
    });
  });
});
