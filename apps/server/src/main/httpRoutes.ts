import type http from "node:http";
import type { GestureConfig } from "@facecue/gesture-core";
import { getLogger, toErrorPayload } from "../shared/logger";
import { toThresholdsDocument } from "./thresholdsLoader";

const logger = getLogger("http");

export type HttpRouteContext = {
  getSessionCount: () => number;
  getConfig: () => GestureConfig;
};

export type HttpRouteResponse = {
  status: number;
  body?: unknown;
};

const JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET,OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
};

export const routeHttpRequest = (
  method: string | undefined,
  url: string | undefined,
  context: HttpRouteContext,
): HttpRouteResponse => {
  if (method === "OPTIONS") {
    return { status: 204 };
  }

  if (!url) {
    return { status: 400, body: { error: "Missing request URL" } };
  }

  let pathname: string;
  try {
    pathname = new URL(url, "http://localhost").pathname;
  } catch (error) {
    logger.warn("Invalid request URL received", {
      url,
      ...toErrorPayload(error),
    });
    return { status: 400, body: { error: "Invalid request URL" } };
  }

  if (method !== "GET") {
    return { status: 405, body: { error: "Method not allowed" } };
  }

  if (pathname === "/api/health") {
    return {
      status: 200,
      body: { status: "healthy", sessions: context.getSessionCount() },
    };
  }

  if (pathname === "/api/thresholds") {
    return { status: 200, body: toThresholdsDocument(context.getConfig()) };
  }

  return { status: 404, body: { error: "Not found" } };
};

export const createHttpRequestHandler =
  (context: HttpRouteContext) =>
  (req: http.IncomingMessage, res: http.ServerResponse) => {
    const { status, body } = routeHttpRequest(req.method, req.url, context);
    res.writeHead(status, JSON_HEADERS);
    res.end(body === undefined ? undefined : JSON.stringify(body));
  };
