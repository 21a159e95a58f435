export type * from './pdf.js';
export type * from './outline.js';
export type * from './config.js';
