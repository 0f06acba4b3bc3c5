/**
 * POST /convert/:profile Handler
 *
 * Streams the XML request body through the engine and answers with one
 * text line per matched pair (plus side-channel lines), written as they are
 * produced. Records sent before a failure remain valid output.
 */

import { WritableLineSink } from '../engine/components/LineSink.js';
import { logRequest, logResponse } from '../logging/index.js';
import { conversionService } from '../services/index.js';
import { handleStreamingError, sendHTTPError } from '../utils/http/index.js';

import type { ExtractionProfile } from '../types/index.js';
import type { Request, Response } from 'express';

const ROUTE_NAME = 'CONVERT';

export default async function convertHandler(req: Request<{ profile: string }>, res: Response): Promise<void> {
  const started = Date.now();
  logRequest(req, ROUTE_NAME);

  let profile: ExtractionProfile;
  try {
    profile = conversionService.resolveProfile(req.params.profile);
  } catch (error: unknown) {
    sendHTTPError(res, error, ROUTE_NAME);
    logResponse(res.statusCode, ROUTE_NAME, Date.now() - started);
    return;
  }

  res.status(200);
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.setHeader('X-Pairstream-Profile', profile.name);

  try {
    const result = await conversionService.convert(req, new WritableLineSink(res), {
      profile,
      sourceName: `request:${profile.name}`,
    });
    res.end();
    logResponse(200, ROUTE_NAME, Date.now() - started, result.stats.pairsEmitted);
  } catch (error: unknown) {
    const status = handleStreamingError(res, error, ROUTE_NAME);
    if (status === undefined) {
      logResponse(200, ROUTE_NAME, Date.now() - started, undefined, 'aborted');
    } else {
      logResponse(status, ROUTE_NAME, Date.now() - started);
    }
  }
}
