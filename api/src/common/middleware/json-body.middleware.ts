import { json } from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { MalformedBodyError } from '../errors/serving.errors';

const parseJson = json();

/**
 * JSON body parser that reports syntax errors as MalformedBodyError.
 * Registered ahead of Nest's own parser, which then finds the body already
 * read and skips it.
 */
export const jsonBody: RequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  parseJson(req, res, (err?: unknown) => {
    if (err instanceof SyntaxError) {
      next(new MalformedBodyError(err.message, { cause: err }));
      return;
    }
    next(err);
  });
};
