export { appConfig, logConfig } from './app.config';
export { dbConfig } from './database.config';
