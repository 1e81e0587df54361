import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { ZodType, ZodTypeDef } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DATA_DIR = path.resolve(__dirname, '../../data');

export function dataPath(file: string): string {
  return path.join(DATA_DIR, file);
}

export function readJsonFile<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const raw = readFileSync(filePath, 'utf-8');
  return schema.parse(JSON.parse(raw));
}
