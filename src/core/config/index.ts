export { ConfigLoader } from './ConfigLoader';
export { ConfigValidator } from './ConfigValidator';
export type { ValidationResult } from './ConfigValidator';
