import type { ErrorRequestHandler, RequestHandler } from "express";
import { RatingError, type RatingErrorKind } from "../types/errors";
import { renderErrorPage, type ErrorPageContext } from "../views/error_page";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const RATING_ERROR_TITLES: Record<RatingErrorKind, string> = {
  UnknownPlayer: "Unknown Player",
  DuplicatePlayer: "Duplicate Player",
  InvalidMatch: "Invalid Match",
  InvalidPlayer: "Invalid Player",
  StorageReadError: "Storage Unavailable",
  StorageWriteError: "Storage Unavailable",
};

const FIXED_PAGES: Record<number, Omit<ErrorPageContext, "code">> = {
  403: {
    message: "Access Forbidden",
    description: "You don't have permission to access this page.",
  },
  404: {
    message: "Page Not Found",
    description: "The page you are looking for does not exist. It might have been moved or deleted.",
  },
  500: {
    message: "Something Went Wrong",
    description: "We're experiencing some trouble on our end. Please try again later.",
  },
};

export function errorContext(err: unknown): ErrorPageContext {
  if (err instanceof RatingError && err.isUserFacing) {
    return { code: err.status, message: RATING_ERROR_TITLES[err.kind], description: err.message };
  }

  if (err instanceof HttpError) {
    const fixed = FIXED_PAGES[err.status];
    return fixed ? { code: err.status, ...fixed } : { code: err.status, message: err.message, description: err.message };
  }

  return { code: 500, ...FIXED_PAGES[500] };
}

export const notFound: RequestHandler = (req, _res, next) => {
  next(new HttpError(404, `No route for ${req.method} ${req.path}`));
};

export const handleError: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const context = errorContext(err);
  if (context.code >= 500) {
    console.error(`❌ ${req.method} ${req.originalUrl} failed:`, err);
  }
  res.status(context.code).send(renderErrorPage(context));
};
