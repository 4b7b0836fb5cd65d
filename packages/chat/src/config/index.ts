export {
  loadConfig,
  DEFAULT_MODEL,
  DEFAULT_HISTORY_DIR,
  DEFAULT_SYSTEM_INSTRUCTION,
  DEFAULT_SYSTEM_INSTRUCTION_FILE,
  type ChatConfig,
  type Env,
  type LoadConfigOptions,
} from './config.js';
