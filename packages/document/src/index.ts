export * from './tree.js';
export { cheerioDocumentParser } from './cheerio-tree.js';
export * from './excerpt.js';
export * from './keywords.js';
export * from './reducer.js';
export * from './outline.js';
export * from './expander.js';
