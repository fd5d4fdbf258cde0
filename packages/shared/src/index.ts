export {
  DEFAULT_CONFIG,
  configTemplate,
  type ConfigTemplateAnswers,
} from './config.js';
export { mkdirSafe } from './utils.js';
export {
  validateStore,
  formatValidation,
  type ValidationCheck,
} from './validation.js';
