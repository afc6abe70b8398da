import { Request, Response, NextFunction } from 'express';
import { AnalysisService } from './analysis.service';
import { AnalyzeRequestDto } from '../../interfaces/dto/AnalyzeRequestDto';
import { AppError } from '../../utils/errorHandler';

export class AnalysisController {
  constructor(private readonly analysisService: AnalysisService = new AnalysisService()) {}

  home(req: Request, res: Response) {
    res.json({ message: 'Skill Gap Analyzer Backend Running' });
  }

  async analyze(req: Request, res: Response, next: NextFunction) {
    try {
      const fileMap = !req.files || Array.isArray(req.files) ? undefined : req.files;

      const resumeFile = fileMap?.resume?.[0];
      const jobDescriptionFile = fileMap?.job_description?.[0];

      if (!resumeFile || !jobDescriptionFile) {
        throw new AppError('Both resume and job_description files are required', 400);
      }

      const dto: AnalyzeRequestDto = {
        resumeFile,
        jobDescriptionFile
      };

      const result = await this.analysisService.analyze(dto);

      res.json(result);
    } catch (error) {
      next(error);
    }
  }

  async listSkills(req: Request, res: Response, next: NextFunction) {
    try {
      const result = await this.analysisService.listSkills();

      res.json(result);
    } catch (error) {
      next(error);
    }
  }

  async reloadSkills(req: Request, res: Response, next: NextFunction) {
    try {
      const result = await this.analysisService.reloadSkills();

      res.json(result);
    } catch (error) {
      next(error);
    }
  }
}
