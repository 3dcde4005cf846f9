import type { NextFunction, Request, Response } from "express";

function enableCors(res: Response): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, PUT, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
}

/** Adds CORS headers to every response and answers preflight requests. */
export function corsMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  enableCors(res);

  if (req.method === "OPTIONS") {
    res.sendStatus(204);
    return;
  }

  next();
}
