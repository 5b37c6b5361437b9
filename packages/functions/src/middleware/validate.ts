import type { ZodSchema } from 'zod';

/**
 * Replace req.body with the schema's parsed output.
 * A ZodError is thrown synchronously and reaches the error handler.
 */
export function validate<T>(schema: ZodSchema<T>) {
  return (req: { body: unknown }, _res: unknown, next: () => void): void => {
    req.body = schema.parse(req.body);
    next();
  };
}

export function validateParams<T>(schema: ZodSchema<T>) {
  return (req: { params: unknown }, _res: unknown, next: () => void): void => {
    schema.parse(req.params);
    next();
  };
}
