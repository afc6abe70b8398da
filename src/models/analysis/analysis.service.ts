import { env } from '../../config/env';
import { AnalyzeRequestDto } from '../../interfaces/dto/AnalyzeRequestDto';
import { AnalyzeResponseDto, toAnalyzeResponseDto } from '../../interfaces/dto/AnalyzeResponseDto';
import { SkillTerm } from '../../interfaces/domain/SkillGap';
import { SkillGapEngine } from '../../utils/skillGapEngine';
import { SkillVocabulary } from '../../utils/skillVocabulary';
import { extractDocumentText } from '../../utils/textParser';
import { logger } from '../../utils/logger';

export function createEngineFromEnv(): SkillGapEngine {
  return new SkillGapEngine({
    weak: env.FUZZY_THRESHOLD_WEAK,
    strong: env.FUZZY_THRESHOLD_STRONG,
    minStrongOccurrences: env.MIN_OCCURRENCE_FOR_STRONG
  });
}

export class AnalysisService {
  constructor(
    private readonly engine: SkillGapEngine = createEngineFromEnv(),
    private readonly vocabulary: SkillVocabulary = new SkillVocabulary(env.SKILLS_CSV_PATH)
  ) {}

  async analyze(dto: AnalyzeRequestDto): Promise<AnalyzeResponseDto> {
    const resumeText = await extractDocumentText('resume', {
      buffer: dto.resumeFile.buffer,
      filename: dto.resumeFile.originalname,
      mimetype: dto.resumeFile.mimetype
    });
    const jdText = await extractDocumentText('job_description', {
      buffer: dto.jobDescriptionFile.buffer,
      filename: dto.jobDescriptionFile.originalname,
      mimetype: dto.jobDescriptionFile.mimetype
    });

    const skills = await this.vocabulary.get();
    const result = this.engine.analyze(resumeText, jdText, skills);

    if (result.kind === 'warning') {
      logger.warn('Skipped matching: skills vocabulary is empty');
      return toAnalyzeResponseDto(result);
    }

    logger.info('Skill gap analysis completed', {
      resume: dto.resumeFile.originalname,
      jobDescription: dto.jobDescriptionFile.originalname,
      totalRequired: result.summary.totalRequired,
      gapScorePercent: result.summary.gapScorePercent
    });

    return toAnalyzeResponseDto(result, {
      resume_filename: dto.resumeFile.originalname,
      job_description_filename: dto.jobDescriptionFile.originalname
    });
  }

  async listSkills(): Promise<{ count: number; skills: SkillTerm[] }> {
    const skills = await this.vocabulary.get();
    return { count: skills.length, skills: [...skills] };
  }

  async reloadSkills(): Promise<{ count: number }> {
    const skills = await this.vocabulary.reload();
    logger.info('Skills vocabulary reloaded', { count: skills.length });
    return { count: skills.length };
  }
}
