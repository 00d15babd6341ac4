export { HandlebarsAdapter } from './handlebars.js';
export { JavaScriptAdapter, wrapSource } from './javascript.js';
