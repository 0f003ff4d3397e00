import type { Request, RequestHandler, Response } from "express";
import type { ZodType, ZodTypeDef } from "zod";

type ValidatedHandler<T> = (input: T, req: Request, res: Response) => unknown;

/**
 * Parses body/query/params together; a failed parse answers 400 before the
 * handler runs. Rejections from the handler reach the error middleware.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, handler: ValidatedHandler<T>): RequestHandler {
  return async (req, res) => {
    const result = schema.safeParse({
      body: req.body,
      query: req.query,
      params: req.params,
    });

    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue.path.join(".");
      res.status(400).json({ error: where ? `${where}: ${issue.message}` : issue.message });
      return;
    }

    await handler(result.data, req, res);
  };
}
