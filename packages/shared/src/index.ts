// Shared vocabulary for covermark packages

export * from './marks/index.js';
export * from './types/check-report.js';
