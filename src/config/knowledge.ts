import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';

/** Reads the onboarding knowledge base once; relative paths resolve from the working directory. */
export function loadKnowledgeBase(filePath: string): string {
  const resolved = path.resolve(process.cwd(), filePath);
  const text = fs.readFileSync(resolved, 'utf8');
  logger.info('Knowledge base loaded', { path: resolved, chars: text.length });
  return text;
}
