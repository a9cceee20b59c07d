export { classifyType, buildTypeKeywords } from './classify.js';
export type { TypeKeywords } from './classify.js';
