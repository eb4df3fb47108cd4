export { createApp } from './app.js';
export { loadConfig, type MirrorConfig } from './config.js';
export { createMirrorServices, type MirrorServices, type Resolution } from './mirror.js';
export { LogStore, StoredEntrySchema, type StoredEntry, type ExportQuery } from './store.js';
export { importAuth } from './middleware/auth.js';
