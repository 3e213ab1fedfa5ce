import path from 'node:path';
import { config as loadEnv } from 'dotenv';

// Variables already in the environment win over the file.
loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});
