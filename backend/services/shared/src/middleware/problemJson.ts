// backend/services/shared/src/middleware/problemJson.ts

/**
 * Purpose:
 * - Error responses are RFC 7807 Problem+JSON so clients and tests can rely
 *   on one shape across services.
 * - 404s are only formatted as Problem+JSON under known prefixes; anything
 *   else (static misses, probes) gets a bare 404.
 *
 * Notes:
 * - Transport-level formatting only, no business logic.
 * - Error detail stays minimal: the message of the thrown error, nothing else.
 */

import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import { requestIdOf } from "./requestId";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  detail?: string;
  code?: string;
  instance?: string;
};

export function sendProblem(
  req: Request,
  res: Response,
  problem: ProblemJson
): void {
  res
    .status(problem.status)
    .type(PROBLEM_CONTENT_TYPE)
    .json({ ...problem, instance: problem.instance ?? requestIdOf(req) });
}

function field(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  return Reflect.get(err, key);
}

function text(v: unknown): string | undefined {
  return typeof v === "string" && v.trim() ? v : undefined;
}

/** Normalize status code; anything outside 400..599 becomes 500. */
export function statusOf(err: unknown): number {
  const n = Number(field(err, "statusCode") ?? field(err, "status") ?? 500);
  if (!Number.isInteger(n) || n < 400 || n > 599) return 500;
  return n;
}

export function notFoundProblemJson(validPrefixes: string[]): RequestHandler {
  return (req, res) => {
    const known = validPrefixes.some((p) =>
      p === "/" ? req.path === "/" : req.path.startsWith(p)
    );
    if (!known) {
      res.status(404).end();
      return;
    }
    sendProblem(req, res, {
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
    });
  };
}

export function errorProblemJson(): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const status = statusOf(err);

    req.log?.error(
      { status, path: req.originalUrl, err },
      "request error"
    );

    sendProblem(req, res, {
      type: text(field(err, "type")) ?? "about:blank",
      title:
        text(field(err, "title")) ??
        (status >= 500 ? "Internal Server Error" : "Request Error"),
      status,
      detail: text(field(err, "message")) ?? "Unexpected error",
      code: text(field(err, "code")),
    });
  };
}
