export { env, validateEnv, type Env } from './env.js';
export { createDatabase, closeDatabase } from './database.js';
