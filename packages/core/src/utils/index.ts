export { normalizeType } from './normalize.js';
export { Money } from './money.js';
