export { readResources, parseResources, readStream, STDIN_PATH } from './reader.js';
