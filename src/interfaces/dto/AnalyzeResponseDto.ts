import { AnalysisResult, ComparisonEntry, GapSummary } from '../domain/SkillGap';

export interface GapSummaryDto {
  total_required: number;
  present: number;
  weak: number;
  missing: number;
  gap_score_percent: number;
}

export interface ComparisonEntryDto {
  skill: string;
  status: ComparisonEntry['status'];
  jd_best_score: number;
  resume_best_score: number;
  resume_occurrences: number;
  evidence: string[];
}

export interface AnalyzeMetadataDto {
  resume_filename: string;
  job_description_filename: string;
}

export interface GapReportDto {
  summary: GapSummaryDto;
  comparison: ComparisonEntryDto[];
  metadata?: AnalyzeMetadataDto;
}

export interface VocabularyWarningDto {
  warning: string;
  resume_snippet: string;
  jd_snippet: string;
}

export type AnalyzeResponseDto = GapReportDto | VocabularyWarningDto;

function toSummaryDto(summary: GapSummary): GapSummaryDto {
  return {
    total_required: summary.totalRequired,
    present: summary.present,
    weak: summary.weak,
    missing: summary.missing,
    gap_score_percent: summary.gapScorePercent
  };
}

function toComparisonDto(entry: ComparisonEntry): ComparisonEntryDto {
  return {
    skill: entry.skill,
    status: entry.status,
    jd_best_score: entry.jdBestScore,
    resume_best_score: entry.resumeBestScore,
    resume_occurrences: entry.resumeOccurrences,
    evidence: [...entry.evidence]
  };
}

export function toAnalyzeResponseDto(
  result: AnalysisResult,
  metadata?: AnalyzeMetadataDto
): AnalyzeResponseDto {
  if (result.kind === 'warning') {
    return {
      warning: result.warning,
      resume_snippet: result.resumeSnippet,
      jd_snippet: result.jdSnippet
    };
  }

  const dto: GapReportDto = {
    summary: toSummaryDto(result.summary),
    comparison: result.comparison.map(toComparisonDto)
  };
  if (metadata) {
    dto.metadata = metadata;
  }
  return dto;
}
