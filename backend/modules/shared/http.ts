import type { Request, Response } from 'express';

import { mapErrorToApiResponse } from '../../reliability/FailureHandling';

export const sendData = (res: Response, data: unknown, status = 200) => {
  res.status(status).json({ success: true, data });
};

export const sendError = (res: Response, err: unknown, operation: string) => {
  const { status, body } = mapErrorToApiResponse(err, { operation });
  res.status(status).json(body);
};

/**
 * Runs a synchronous handler body and converts anything it throws into the
 * standard error envelope.
 */
export const handle =
  (operation: string, body: (req: Request, res: Response) => void) =>
  (req: Request, res: Response) => {
    try {
      body(req, res);
    } catch (err) {
      sendError(res, err, operation);
    }
  };

export const routeParam = (req: Request, name: string): string => {
  const value: unknown = req.params[name];
  return typeof value === 'string' ? value.trim() : '';
};

export const queryString = (req: Request, name: string): string | undefined => {
  const value: unknown = req.query[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
};
