import { Request, Response, NextFunction } from "express";
import { ZodSchema, typeToFlattenedError } from "zod";

type RequestPart = "params" | "query" | "body";

type SchemaConfig = Partial<Record<RequestPart, ZodSchema<unknown>>>;

const PARTS: readonly RequestPart[] = ["params", "query", "body"];

/**
 * Rejects the request with 422 before the handler runs, reporting every failing part
 * at once. Handlers read their input through the same schemas
 * (see `app/Validation/requestSchemas`).
 */
export function validateZod(schemas: SchemaConfig) {
  return (req: Request, res: Response, next: NextFunction) => {
    const details: Partial<Record<RequestPart, typeToFlattenedError<unknown>>> = {};
    for (const part of PARTS) {
      const parsed = schemas[part]?.safeParse(req[part]);
      if (parsed && !parsed.success) details[part] = parsed.error.flatten();
    }
    if (Object.keys(details).length > 0) {
      return res.status(422).json({ error: "validation_failed", details });
    }
    return next();
  };
}
