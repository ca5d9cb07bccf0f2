import type { Response } from "express";
import { ZodError } from "zod";
import { BatchTooLargeError, IncompatibleRepresentationError, describeError } from "../utils/errors";

export function statusFor(error: unknown): number {
  if (error instanceof BatchTooLargeError) return 400;
  if (error instanceof ZodError) return 400;
  if (error instanceof IncompatibleRepresentationError) return 409;
  return 500;
}

export function sendError(res: Response, error: unknown, fallback: string): void {
  const status = statusFor(error);
  if (status === 500) {
    console.error(`${fallback}:`, error);
    res.status(500).json({ error: fallback, details: describeError(error) });
    return;
  }
  if (error instanceof ZodError) {
    res.status(400).json({
      error: 'Invalid request body',
      issues: error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    });
    return;
  }
  console.warn(`[HTTP] ${fallback}: ${describeError(error)}`);
  res.status(status).json({ error: describeError(error) });
}
