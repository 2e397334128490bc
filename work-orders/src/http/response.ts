import { Response } from "express";

export interface APIResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  timestamp: string;
}

export function sendSuccess<T>(res: Response, data: T): void {
  const body: APIResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
  res.json(body);
}

export function sendError(res: Response, status: number, error: string): void {
  const body: APIResponse<never> = {
    success: false,
    error,
    timestamp: new Date().toISOString(),
  };
  res.status(status).json(body);
}
