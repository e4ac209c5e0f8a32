export { isDebugMode } from './debug.js';
