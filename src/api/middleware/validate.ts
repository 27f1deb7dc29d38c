import type { NextFunction, Request, Response } from 'express';
import { validationResult, type ValidationChain } from 'express-validator';

export interface FieldProblem {
  field: string;
  location?: string;
  message: string;
}

/** Run the chains, then answer 400 with one problem per failing field. */
export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    const details: FieldProblem[] = errors.array({ onlyFirstError: true }).map((e) =>
      e.type === 'field'
        ? { field: e.path, location: e.location, message: String(e.msg) }
        : { field: e.type, message: String(e.msg) }
    );
    res.status(400).json({ error: 'Validation failed', code: 'VALIDATION_ERROR', details });
  };
}
