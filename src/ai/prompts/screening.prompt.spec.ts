import { buildScreeningPrompt } from './screening.prompt';

describe('buildScreeningPrompt', () => {
  const jobDescription = 'Data engineer. Spark and SQL required.';
  const resumeText = 'Jane Roe\n4 years of Spark pipelines';

  it('embeds the job description and resume in delimited sections', () => {
    const prompt = buildScreeningPrompt(jobDescription, resumeText);

    expect(prompt).toContain(`JOB DESCRIPTION:\n"""\n${jobDescription}\n"""`);
    expect(prompt).toContain(`RESUME:\n"""\n${resumeText}\n"""`);
  });

  it('asks for every evaluation field', () => {
    const prompt = buildScreeningPrompt(jobDescription, resumeText);

    for (const field of [
      '"match_score"',
      '"skills_match_score"',
      '"experience_match_score"',
      '"mandatory_skills_present"',
      '"strengths"',
      '"gaps"',
      '"final_recommendation"',
      '"reasoning"',
    ]) {
      expect(prompt).toContain(field);
    }
  });

  it('uses the default shortlist threshold of 75', () => {
    expect(buildScreeningPrompt(jobDescription, resumeText)).toContain(
      'mandatory_skills_present is true AND match_score >= 75',
    );
  });

  it('uses a custom shortlist threshold', () => {
    expect(
      buildScreeningPrompt(jobDescription, resumeText, {
        shortlistThreshold: 60,
      }),
    ).toContain('mandatory_skills_present is true AND match_score >= 60');
  });

  it('is deterministic', () => {
    expect(buildScreeningPrompt(jobDescription, resumeText)).toBe(
      buildScreeningPrompt(jobDescription, resumeText),
    );
  });
});
