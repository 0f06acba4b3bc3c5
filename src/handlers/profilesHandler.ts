/**
 * GET /profiles Handler
 *
 * Lists every profile the server can convert with.
 */

import { conversionService } from '../services/index.js';

import type { Request, Response } from 'express';

export default function profilesHandler(_req: Request, res: Response): void {
  const profiles = conversionService.listProfiles().map((profile) => ({
    name: profile.name,
    description: profile.description,
    block: profile.blockElement,
    labels: profile.labels.map((label) => label.name),
    first: `${profile.first.name} (${profile.first.kind})`,
    second: `${profile.second.name} (${profile.second.kind})`,
    indexed: profile.indexed,
  }));

  res.status(200).json({ profiles });
}
