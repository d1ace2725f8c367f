export { compileTemplate } from './template';
