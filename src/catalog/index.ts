export * from './store.js';
export { FICTIONAL_BOOKS } from './seed.js';
