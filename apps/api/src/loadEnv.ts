import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Imported first by the entry point so every module sees the loaded values.
// Load repo-root .env first, then optionally let apps/api/.env override it.
// __dirname is .../apps/api/src (or dist), so repo-root is three levels up.
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });
dotenv.config({ override: true });
