export {
  EnvSchema,
  DEFAULT_MESSAGES_PER_SECOND,
  parseEnv,
  createConfig,
  validateConfig,
} from './env.js';
export type { Env, AppConfig } from './env.js';
