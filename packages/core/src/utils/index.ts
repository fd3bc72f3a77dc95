export { normalizeName } from './normalize.js';
