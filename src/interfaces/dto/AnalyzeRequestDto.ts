export interface AnalyzeRequestDto {
  resumeFile: Express.Multer.File;
  jobDescriptionFile: Express.Multer.File;
}
