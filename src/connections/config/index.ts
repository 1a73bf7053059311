export { appConfig, searchConfig } from './app.config';
export { dbConfig } from './database.config';
