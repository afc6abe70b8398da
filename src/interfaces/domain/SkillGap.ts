export type SkillTerm = string;

export type SkillStatus = 'present' | 'weak' | 'missing';

export interface SkillEvidence {
  occurrences: number;
  bestScore: number;
}

export interface EvidenceRecord extends SkillEvidence {
  skill: SkillTerm;
}

/**
 * An evidence record from the job description that passed the requirement filter.
 * Its `bestScore` is what the report calls the JD best score.
 */
export type RequiredSkill = EvidenceRecord;

export interface ComparisonEntry {
  skill: SkillTerm;
  status: SkillStatus;
  jdBestScore: number;
  resumeBestScore: number;
  resumeOccurrences: number;
  evidence: string[];
}

export interface GapSummary {
  totalRequired: number;
  present: number;
  weak: number;
  missing: number;
  gapScorePercent: number;
}

export interface MatchThresholds {
  weak: number;
  strong: number;
  minStrongOccurrences: number;
}

export interface GapReport {
  kind: 'report';
  summary: GapSummary;
  comparison: ComparisonEntry[];
}

export interface VocabularyWarning {
  kind: 'warning';
  warning: string;
  resumeSnippet: string;
  jdSnippet: string;
}

export type AnalysisResult = GapReport | VocabularyWarning;
