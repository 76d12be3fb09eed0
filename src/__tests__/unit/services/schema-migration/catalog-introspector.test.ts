import { CatalogIntrospector, isSystemSchema } from '../../../../services/schema-migration/catalog-introspector';
import { CatalogQueryError } from '../../../../utils/errors';
import { createFakeDb } from '../../../utils/fakes';

describe('CatalogIntrospector', () => {
  it('recognises system schemas', () => {
    expect(isSystemSchema('pg_catalog')).toBe(true);
    expect(isSystemSchema('pg_toast_temp_1')).toBe(true);
    expect(isSystemSchema('pg_temp_3')).toBe(true);
    expect(isSystemSchema('public')).toBe(false);
  });

  it('lists user tables without excluded schemas', async () => {
    const { fns, db } = createFakeDb();
    fns.query.mockResolvedValueOnce([
      { table_schema: 'audit', table_name: 'log' },
      { table_schema: 'public', table_name: 'events' },
      { table_schema: 'pg_toast', table_name: 'chunk' },
    ]);

    await expect(new CatalogIntrospector(db).listTables(/^audit$/)).resolves.toEqual([
      { schemaName: 'public', tableName: 'events' },
    ]);
  });

  it('filters schemas by pattern', async () => {
    const { fns, db } = createFakeDb();
    fns.query.mockResolvedValueOnce([{ name: 'audit' }, { name: 'information_schema' }, { name: 'public' }, { name: 'audit_old' }]);

    await expect(new CatalogIntrospector(db).listSchemas(/^audit/)).resolves.toEqual(['audit', 'audit_old']);
  });

  it('describes a table inside one transaction with the search path set', async () => {
    const { fns, tx, db } = createFakeDb();
    tx.query
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([
        {
          name: 'id',
          formatted_type: 'bigint',
          not_null: true,
          default_expression: null,
          identity: 'a',
          generated: '',
        },
        {
          name: 'total',
          formatted_type: 'numeric',
          not_null: false,
          default_expression: '(qty * price)',
          identity: '',
          generated: 's',
        },
      ])
      .mockResolvedValueOnce([
        { name: 'orders_pkey', kind: 'p', definition: 'PRIMARY KEY (id)' },
        { name: 'orders_trigger', kind: 't', definition: 'TRIGGER' },
      ])
      .mockResolvedValueOnce([{ name: 'orders_total_idx', definition: 'CREATE INDEX orders_total_idx ON sales.orders (total)' }]);

    const table = await new CatalogIntrospector(db).describeTable({ schemaName: 'sales', tableName: 'orders' });

    expect(fns.withTransaction).toHaveBeenCalledTimes(1);
    expect(tx.query.mock.calls[0][1]).toEqual(['search_path', '"sales"']);
    expect(tx.query.mock.calls[1][1]).toEqual(['sales', 'orders']);
    expect(table).toEqual({
      ref: { schemaName: 'sales', tableName: 'orders' },
      columns: [
        { name: 'id', formattedType: 'bigint', notNull: true, defaultExpression: null, identityKind: 'always', generated: false },
        {
          name: 'total',
          formattedType: 'numeric',
          notNull: false,
          defaultExpression: '(qty * price)',
          identityKind: 'none',
          generated: true,
        },
      ],
      constraints: [{ name: 'orders_pkey', kind: 'p', definition: 'PRIMARY KEY (id)' }],
      indexes: [{ name: 'orders_total_idx', definition: 'CREATE INDEX orders_total_idx ON sales.orders (total)' }],
    });
  });

  it('snapshots tables and the sequences their defaults use', async () => {
    const { fns, tx, db } = createFakeDb();
    fns.query.mockResolvedValueOnce([{ table_schema: 'public', table_name: 'events' }]);
    tx.query
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([
        {
          name: 'id',
          formatted_type: 'integer',
          not_null: true,
          default_expression: "nextval('events_id_seq'::regclass)",
          identity: '',
          generated: '',
        },
      ])
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([]);
    fns.queryOne.mockResolvedValueOnce({
      data_type: 'integer',
      start_value: '1',
      min_value: '1',
      max_value: '2147483647',
      increment_by: '1',
      cycle: false,
    });

    const snapshot = await new CatalogIntrospector(db).snapshot();

    expect(fns.queryOne.mock.calls[0][1]).toEqual(['public', 'events_id_seq']);
    expect(snapshot.sequences).toEqual([
      {
        reference: {
          sequenceSchema: 'public',
          sequenceName: 'events_id_seq',
          ownerTableSchema: 'public',
          ownerTableName: 'events',
          ownerColumnName: 'id',
        },
        options: { dataType: 'integer', startValue: '1', minValue: '1', maxValue: '2147483647', incrementBy: '1', cycle: false },
      },
    ]);
  });

  it('keeps a sequence without options when the catalog has no row for it', async () => {
    const { fns, db } = createFakeDb();
    await expect(new CatalogIntrospector(db).describeSequence('public', 'gone_seq')).resolves.toBeNull();
    expect(fns.queryOne).toHaveBeenCalledTimes(1);
  });

  it('wraps driver failures in CatalogQueryError', async () => {
    const { fns, db } = createFakeDb();
    fns.query.mockRejectedValueOnce(Object.assign(new Error('permission denied for schema secret'), { code: '42501' }));

    const failure = new CatalogIntrospector(db).listTables();
    await expect(failure).rejects.toBeInstanceOf(CatalogQueryError);
    await expect(failure).rejects.toMatchObject({
      message: 'Catalog query listTables failed: permission denied for schema secret',
      context: { operation: 'listTables', code: '42501' },
    });
  });
});
