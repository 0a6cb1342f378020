/**
 * Status Handlers
 *
 * `GET /` describes the running bridge; `GET /health` is a liveness probe
 * that never touches the backend.
 */

import { APP_VERSION } from "../constants/app.js";

import type { ProxyConfig } from "../config.js";
import type { Request, Response } from "express";

export interface StatusDocument {
  status: "healthy";
  provider: string;
  model: string;
  version: string;
  /** Seconds since the app was created */
  uptime: number;
}

export interface HealthDocument {
  status: "ok";
  timestamp: string;
}

export function createStatusHandler(
  config: ProxyConfig,
  startedAt: number = Date.now(),
): (req: Request, res: Response) => void {
  return function statusHandler(_req: Request, res: Response): void {
    const body: StatusDocument = {
      status: "healthy",
      provider: config.backend.providerName,
      model: config.backend.modelName,
      version: APP_VERSION,
      uptime: Math.floor((Date.now() - startedAt) / 1000),
    };
    res.json(body);
  };
}

export function healthHandler(_req: Request, res: Response): void {
  const body: HealthDocument = { status: "ok", timestamp: new Date().toISOString() };
  res.json(body);
}
