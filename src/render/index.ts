export { RenderStyleError, clauseTrees, renderTest, renderUnit } from './renderer.js';
export type { RenderPosition } from './renderer.js';
