import type { Response } from "express";
import type { ZodError } from "zod";
import { InvalidArgumentError } from "../core/errors";
import { describeProviderError, LLMProviderError } from "../llm/client";

export class HttpRouteError extends Error {
  status: number;
  body: Record<string, unknown>;

  constructor(status: number, body: Record<string, unknown>) {
    super(typeof body.error === "string" ? body.error : "Request failed.");
    this.name = "HttpRouteError";
    this.status = status;
    this.body = body;
  }
}

export function badRequestFromZod(message: string, error: ZodError): HttpRouteError {
  return new HttpRouteError(400, {
    error: message,
    issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
  });
}

export function sendRouteError(res: Response, error: unknown, failureMessage: string): void {
  if (error instanceof HttpRouteError) {
    res.status(error.status).json(error.body);
    return;
  }
  if (error instanceof InvalidArgumentError) {
    res.status(400).json({ error: error.message, argument: error.argument });
    return;
  }
  if (error instanceof LLMProviderError) {
    console.error(`[${error.provider}]`, error.message);
    res.status(502).json({ error: describeProviderError(error) });
    return;
  }
  console.error(error);
  res.status(500).json({ error: failureMessage });
}
