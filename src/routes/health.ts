import fs from 'fs';
import path from 'path';
import { Router } from 'express';

// package.json sits two levels up from both src/routes and dist/routes.
function readVersion(): string {
  const parsed: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '..', '..', 'package.json'), 'utf8'));
  if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return 'unknown';
}

const version = readVersion();

const r = Router();
r.get('/health', (_req, res) => res.json({ ok: true, version, uptimeSeconds: Math.floor(process.uptime()) }));
export default r;
