/**
 * Vitest global setup: loads .env.test into process.env.
 * Real env vars take precedence.
 */
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';

dotenv.config({ path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '.env.test') });
