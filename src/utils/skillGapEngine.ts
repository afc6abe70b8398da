import {
  AnalysisResult,
  ComparisonEntry,
  EvidenceRecord,
  GapSummary,
  MatchThresholds,
  RequiredSkill,
  SkillEvidence,
  SkillStatus,
  SkillTerm
} from '../interfaces/domain/SkillGap';
import { extractSkillsFromText, findEvidenceLines, indexEvidenceBySkill } from './skillExtractor';

export const DEFAULT_THRESHOLDS: MatchThresholds = {
  weak: 60,
  strong: 80,
  minStrongOccurrences: 2
};

export const SNIPPET_LENGTH = 500;
export const NO_VOCABULARY_WARNING = 'no vocabulary';

const ABSENT: SkillEvidence = { occurrences: 0, bestScore: 0 };

// Ties go to the even neighbour, so 812.5 becomes 812
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  if (value - floor === 0.5) {
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return Math.round(value);
}

// Counts code points so a surrogate pair is never split
function snippet(text: string): string {
  return Array.from(text).slice(0, SNIPPET_LENGTH).join('');
}

/**
 * Compares a resume against a job description over a fixed skill vocabulary.
 * Holds no state beyond its thresholds, so one instance can serve every request.
 */
export class SkillGapEngine {
  readonly thresholds: Readonly<MatchThresholds>;

  constructor(thresholds: Partial<MatchThresholds> = {}) {
    this.thresholds = Object.freeze({ ...DEFAULT_THRESHOLDS, ...thresholds });
  }

  /** A JD skill counts as required if it is mentioned at all or scores at least the weak threshold. */
  filterRequired(evidence: readonly EvidenceRecord[]): RequiredSkill[] {
    return evidence.filter(
      record => record.occurrences > 0 || record.bestScore >= this.thresholds.weak
    );
  }

  // present is checked first: a high score with a single mention is present, not weak
  statusFor(evidence: SkillEvidence): SkillStatus {
    const { weak, strong, minStrongOccurrences } = this.thresholds;
    if (evidence.bestScore >= strong || evidence.occurrences >= minStrongOccurrences) {
      return 'present';
    }
    if (evidence.bestScore >= weak || evidence.occurrences === 1) {
      return 'weak';
    }
    return 'missing';
  }

  classify(
    required: readonly RequiredSkill[],
    resumeText: string,
    resumeEvidence: ReadonlyMap<string, SkillEvidence>
  ): ComparisonEntry[] {
    return required.map(jdSkill => {
      const evidence = resumeEvidence.get(jdSkill.skill.toLowerCase()) ?? ABSENT;
      return {
        skill: jdSkill.skill,
        status: this.statusFor(evidence),
        jdBestScore: jdSkill.bestScore,
        resumeBestScore: evidence.bestScore,
        resumeOccurrences: evidence.occurrences,
        evidence: findEvidenceLines(jdSkill.skill, resumeText, this.thresholds.weak)
      };
    });
  }

  /** With nothing required the gap is reported as 100. */
  score(entries: readonly ComparisonEntry[]): GapSummary {
    const totalRequired = entries.length;
    const present = entries.filter(entry => entry.status === 'present').length;
    const weak = entries.filter(entry => entry.status === 'weak').length;
    const missing = entries.filter(entry => entry.status === 'missing').length;

    const coverage = (present + 0.5 * weak) / Math.max(1, totalRequired);
    const gapScorePercent = roundHalfEven(1000 * (1 - coverage)) / 10;

    return { totalRequired, present, weak, missing, gapScorePercent };
  }

  analyze(resumeText: string, jdText: string, vocabulary: readonly SkillTerm[]): AnalysisResult {
    if (vocabulary.length === 0) {
      return {
        kind: 'warning',
        warning: NO_VOCABULARY_WARNING,
        resumeSnippet: snippet(resumeText),
        jdSnippet: snippet(jdText)
      };
    }

    const required = this.filterRequired(extractSkillsFromText(jdText, vocabulary));
    const resumeEvidence = indexEvidenceBySkill(extractSkillsFromText(resumeText, vocabulary));
    const comparison = this.classify(required, resumeText, resumeEvidence);

    return {
      kind: 'report',
      summary: this.score(comparison),
      comparison
    };
  }
}
