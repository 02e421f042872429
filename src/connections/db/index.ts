export { pool, connectDatabase } from './connection';
export { PgUnitOfWork } from './unit-of-work';
export type { UnitOfWork, Repositories } from './unit-of-work';
export type { Queryable } from './types';
