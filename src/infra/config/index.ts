export {
  EnvSchema,
  DEFAULT_PLACEMENT_DATA_PATH,
  parseEnv,
  createConfig,
  type Env,
  type AppConfig,
} from './env.js';
