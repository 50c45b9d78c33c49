import type express from 'express';
import type { z } from 'zod';

export function parseBody<T extends z.ZodTypeAny>(
  schema: T,
  req: express.Request,
  res: express.Response
): z.infer<T> | null {
  const parseResult = schema.safeParse(req.body);
  if (!parseResult.success) {
    res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
    return null;
  }
  return parseResult.data;
}
