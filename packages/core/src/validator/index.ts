/**
 * Validator module exports
 */

export { Validator } from './validator.js';
export {
  configureDefaultValidator,
  getDefaultValidator,
  resetDefaultValidator,
  validate,
  validatePartial,
} from './default-validator.js';
