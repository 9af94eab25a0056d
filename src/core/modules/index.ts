export { ModuleRegistry } from './ModuleRegistry';
