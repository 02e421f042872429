// Database
export { pool, connectDatabase, PgUnitOfWork } from './db';

// Config - All configurations in one place
export { appConfig, logConfig, dbConfig } from './config';
