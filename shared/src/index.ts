export * from './api/dto.js';
export * from './domain/stageStatus.js';
export * from './domain/normalize.js';
export * from './domain/stages.js';
export * from './domain/fileRefs.js';
export * from './domain/records.js';
export * from './domain/session.js';
