import { Router } from 'express';
import multer from 'multer';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { env } from '../../config/env';

export function createAnalysisRoutes(service: AnalysisService = new AnalysisService()): Router {
  const router = Router();
  const controller = new AnalysisController(service);

  // Configure multer for file uploads
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: env.MAX_UPLOAD_MB * 1024 * 1024
    }
  });

  // GET / - Liveness message
  router.get('/', controller.home.bind(controller));

  // POST /analyze - Compare a resume against a job description
  router.post('/analyze',
    upload.fields([
      { name: 'resume', maxCount: 1 },
      { name: 'job_description', maxCount: 1 }
    ]),
    controller.analyze.bind(controller)
  );

  // GET /skills - Current skills vocabulary
  router.get('/skills', controller.listSkills.bind(controller));

  // POST /skills/reload - Re-read the vocabulary file
  router.post('/skills/reload', controller.reloadSkills.bind(controller));

  return router;
}
