export * from './lib/fact-model.js';
