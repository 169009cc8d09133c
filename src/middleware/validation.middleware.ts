import type { Request, Response, NextFunction } from 'express';
import type { ZodTypeAny } from 'zod';

/** Parse `req.body` with the schema and replace it with the parsed value. */
export function validate<T extends ZodTypeAny>(schema: T) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: 'Validation failed',
        details: parsed.error.flatten(),
      });
      return;
    }

    req.body = parsed.data;
    next();
  };
}
