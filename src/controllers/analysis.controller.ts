import type { Request, Response } from 'express';
import { analysisService } from '../services/analysis.service';
import { validated } from '../middlewares/validate';
import { analyzeBody, compareBody } from '../schemas/analysis.schemas';

export async function analyze(req: Request, res: Response) {
  const body = validated(req, analyzeBody);
  res.json(analysisService.analyze(body));
}

export async function compare(req: Request, res: Response) {
  const body = validated(req, compareBody);
  res.json(analysisService.compare(body));
}
