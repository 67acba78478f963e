import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';

let validKeys: Set<string> | null = null;

function getValidKeys(): Set<string> {
  if (!validKeys) {
    const raw = env.API_KEYS || '';
    validKeys = new Set(
      raw
        .split(',')
        .map((k) => k.trim())
        .filter((k) => k.length > 0)
    );
  }
  return validKeys;
}

export function isValidApiKey(key: unknown): boolean {
  if (typeof key !== 'string' || key.length === 0) {
    return false;
  }
  return getValidKeys().has(key);
}

const PUBLIC_PATHS = new Set(['/health', '/api/admin/health']);

export function apiKeyAuth(req: Request, res: Response, next: NextFunction) {
  // Webhooks carry their provider's own signature
  if (req.path.startsWith('/webhook') || PUBLIC_PATHS.has(req.path)) {
    return next();
  }

  const apiKey = req.headers['x-api-key'];

  if (!apiKey) {
    return res.status(401).json({ success: false, error: 'Missing API key' });
  }

  if (!isValidApiKey(apiKey)) {
    return res.status(403).json({ success: false, error: 'Invalid API key' });
  }

  next();
}
