export const RECOMMENDATIONS = ['Shortlist', 'Reject'] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];

export interface EvaluationResult {
  match_score: number;
  skills_match_score: number;
  experience_match_score: number;
  mandatory_skills_present: boolean;
  strengths: string[];
  gaps: string[];
  final_recommendation: Recommendation;
  reasoning: string;
}
