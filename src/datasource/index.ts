export { bindSessionItems, type BoundStatement } from './bind-variables';
export {
  connectPgDataSource,
  createPgDataSource,
  type PgClient,
  type PgConnection,
  type PgDataSourceOptions,
  type PgPool
} from './pg-data-source';
export {
  createProcedureRegistry,
  type JsonProcedure,
  type ProcedureRegistry
} from './procedure-registry';
