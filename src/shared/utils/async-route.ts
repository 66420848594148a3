import { NextFunction, Request, RequestHandler, Response } from "express";

/** Express 4 ignores rejected handler promises; forward them to the error middleware. */
export function asyncRoute(
  handler: (request: Request, response: Response) => Promise<void>,
): RequestHandler {
  return (request: Request, response: Response, next: NextFunction) => {
    handler(request, response).catch(next);
  };
}
