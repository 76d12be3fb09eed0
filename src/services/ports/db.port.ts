export type DbRow = Record<string, unknown>;

export interface DbQueryOptions {
  /**
   * Optional label for metrics/logging to indicate logical operation (e.g., listTables).
   */
  operation?: string;
}

export interface DbTransactionPort {
  query<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T[]>;
  queryOne<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T | null>;
  insert(tableFqn: string, row: Record<string, unknown>, options?: DbQueryOptions): Promise<void>;
  upsert(
    tableFqn: string,
    keyColumns: string[],
    row: Record<string, unknown>,
    options?: DbQueryOptions
  ): Promise<void>;
}

export interface DbPort extends DbTransactionPort {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  withTransaction<T>(handler: (tx: DbTransactionPort) => Promise<T>): Promise<T>;
}

/** Opens a pool against one database; callers own disconnect(). */
export type DbConnector = (connectionString: string) => DbPort;
