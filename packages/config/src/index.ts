export {
  ACCESS_KEY_HELP,
  loadFxClientEnv,
  loadFxEnv,
  type FxClientEnv,
  type FxEnv
} from './env.js';
