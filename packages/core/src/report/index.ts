export { renderReport, renderReportLines } from './render.js';
export type { RenderOptions } from './render.js';
export { formatMoney } from './format.js';
