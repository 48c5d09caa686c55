import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';

const PUBLIC_PATHS = new Set(['/health', '/api/admin/health']);

let validKeys: Set<string> | null = null;

function getValidKeys(): Set<string> {
  if (!validKeys) {
    validKeys = new Set(
      (env.API_KEYS || '')
        .split(',')
        .map((k) => k.trim())
        .filter((k) => k.length > 0)
    );
  }
  return validKeys;
}

/** Guards the operator API. Webhooks carry their own provider signatures. */
export function apiKeyAuth(req: Request, res: Response, next: NextFunction) {
  if (req.path.startsWith('/webhook') || PUBLIC_PATHS.has(req.path)) {
    return next();
  }

  const apiKey = req.get('x-api-key');
  if (!apiKey) {
    return res.status(401).json({ success: false, error: 'Missing API key' });
  }

  const keys = getValidKeys();
  if (keys.size === 0 || !keys.has(apiKey)) {
    return res.status(403).json({ success: false, error: 'Invalid API key' });
  }

  next();
}
