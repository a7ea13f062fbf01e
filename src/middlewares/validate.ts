import type { z, ZodTypeAny } from 'zod';
import type { Request, RequestHandler } from 'express';
import { ValidationError } from '../common/errors';

type Where = 'body' | 'query' | 'params';

export const validate = (schema: ZodTypeAny, where: Where = 'body'): RequestHandler => (req, _res, next) => {
  const result = schema.safeParse(req[where]);
  if (!result.success) {
    return next(new ValidationError(result.error.flatten()));
  }
  req.validated = { ...req.validated, [where]: result.data };
  next();
};

/** Typed read of what `validate` stored for the same schema. */
export function validated<S extends ZodTypeAny>(req: Request, schema: S, where: Where = 'body'): z.infer<S> {
  return schema.parse(req.validated?.[where] ?? req[where]);
}
