export * from './model.js';
export * from './errors.js';
export * from './format.js';
export * from './merge.js';
export * from './diff.js';
export * from './sync.js';
export * from './plural-rules.js';
export * from './plural-validator.js';
export * from './placeholders.js';
export * from './stats.js';
export * from './edit.js';
export * from './config/index.js';
