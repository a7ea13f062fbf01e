import type { Request, Response } from 'express';
import { analysisService } from '../services/analysis.service';
import { validated } from '../middlewares/validate';
import { brandNameParams } from '../schemas/analysis.schemas';

export async function listBrands(_req: Request, res: Response) {
  res.json({ brands: analysisService.listBrands() });
}

export async function brandDetail(req: Request, res: Response) {
  const { name } = validated(req, brandNameParams, 'params');
  res.json(analysisService.brandProfile(name));
}

export async function listCategories(_req: Request, res: Response) {
  res.json({ categories: analysisService.listCategories() });
}
