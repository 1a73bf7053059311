// Database
export { pool, migrate, connectDatabase } from './db';

// Config
export { appConfig, searchConfig, dbConfig } from './config';
