import {
  emitPostDataScript,
  emitPreDataScript,
  emitSequenceAnchors,
  renderColumn,
  renderCreateTable,
  renderIndex,
} from '../../../../services/schema-migration/ddl-emitter';
import { collectSequenceReferences } from '../../../../services/schema-migration/sequence-default.util';
import type { ColumnInfo, SchemaSnapshot, TableDefinition } from '../../../../services/schema-migration/types';

function column(name: string, overrides: Partial<ColumnInfo> = {}): ColumnInfo {
  return {
    name,
    formattedType: 'integer',
    notNull: false,
    defaultExpression: null,
    identityKind: 'none',
    generated: false,
    ...overrides,
  };
}

const eventsTable: TableDefinition = {
  ref: { schemaName: 'public', tableName: 'events' },
  columns: [
    column('id', { notNull: true, defaultExpression: "nextval('events_id_seq'::regclass)" }),
    column('payload', { formattedType: 'text' }),
  ],
  constraints: [{ name: 'events_pkey', kind: 'p', definition: 'PRIMARY KEY (id)' }],
  indexes: [{ name: 'events_payload_idx', definition: 'CREATE INDEX events_payload_idx ON public.events USING btree (payload)' }],
};

const eventsSnapshot: SchemaSnapshot = {
  tables: [eventsTable],
  sequences: [
    {
      reference: {
        sequenceSchema: 'public',
        sequenceName: 'events_id_seq',
        ownerTableSchema: 'public',
        ownerTableName: 'events',
        ownerColumnName: 'id',
      },
      options: {
        dataType: 'integer',
        startValue: '1',
        minValue: '1',
        maxValue: '2147483647',
        incrementBy: '1',
        cycle: false,
      },
    },
  ],
};

const EVENTS_SETVAL =
  `SELECT pg_catalog.setval('"public"."events_id_seq"', ` +
  `GREATEST((SELECT MAX("id") FROM "public"."events"), m.min_value), ` +
  `EXISTS (SELECT 1 FROM "public"."events")) ` +
  `FROM pg_catalog.pg_sequences m WHERE m.schemaname = 'public' AND m.sequencename = 'events_id_seq';`;

describe('emitPreDataScript', () => {
  it('creates schemas, then sequences, then tables', () => {
    expect(emitPreDataScript(eventsSnapshot)).toBe(
      [
        'CREATE SCHEMA IF NOT EXISTS "public";',
        'CREATE SEQUENCE IF NOT EXISTS "public"."events_id_seq" AS integer INCREMENT BY 1 MINVALUE 1 MAXVALUE 2147483647 START WITH 1 NO CYCLE;',
        'SET search_path TO "public";\n' +
          'CREATE TABLE IF NOT EXISTS "public"."events" (\n' +
          `    "id" integer DEFAULT nextval('events_id_seq'::regclass) NOT NULL,\n` +
          '    "payload" text\n' +
          ');',
      ].join('\n\n') + '\n'
    );
  });

  it('creates a sequence shared by two tables exactly once', () => {
    const tables: TableDefinition[] = ['invoices', 'receipts'].map((name, i) => ({
      ref: { schemaName: 'public', tableName: name },
      columns: [
        column('id', {
          defaultExpression: i === 0 ? "nextval('public.doc_no_seq'::regclass)" : "nextval('doc_no_seq'::regclass)",
        }),
      ],
      constraints: [],
      indexes: [],
    }));
    const snapshot: SchemaSnapshot = {
      tables,
      sequences: collectSequenceReferences(tables).map((reference) => ({ reference, options: null })),
    };

    const pre = emitPreDataScript(snapshot);

    expect(pre.match(/CREATE SEQUENCE/g)).toHaveLength(1);
    expect(pre).toContain('CREATE SEQUENCE IF NOT EXISTS "public"."doc_no_seq";\n');
    expect(emitPostDataScript(snapshot).match(/OWNED BY/g)).toEqual(['OWNED BY']);
    expect(emitPostDataScript(snapshot)).toContain('ALTER SEQUENCE "public"."doc_no_seq" OWNED BY "public"."invoices"."id";');
  });

  it('creates a sequence without options when none were read', () => {
    const snapshot: SchemaSnapshot = {
      tables: [],
      sequences: [{ reference: { ...eventsSnapshot.sequences[0].reference, sequenceSchema: 'sales' }, options: null }],
    };
    expect(emitPreDataScript(snapshot)).toBe(
      'CREATE SCHEMA IF NOT EXISTS "sales";\n\nCREATE SEQUENCE IF NOT EXISTS "sales"."events_id_seq";\n'
    );
  });
});

describe('column and table rendering', () => {
  it('renders identity columns without a DEFAULT clause', () => {
    expect(renderColumn(column('id', { identityKind: 'always', notNull: true, formattedType: 'bigint' }))).toBe(
      '"id" bigint GENERATED ALWAYS AS IDENTITY NOT NULL'
    );
    expect(renderColumn(column('id', { identityKind: 'byDefault' }))).toBe('"id" integer GENERATED BY DEFAULT AS IDENTITY');
  });

  it('renders stored generated columns', () => {
    expect(renderColumn(column('total', { generated: true, defaultExpression: '(qty * price)', formattedType: 'numeric' }))).toBe(
      '"total" numeric GENERATED ALWAYS AS ((qty * price)) STORED'
    );
  });

  it('renders a table with no columns', () => {
    expect(renderCreateTable({ ref: { schemaName: 's', tableName: 't' }, columns: [], constraints: [], indexes: [] })).toBe(
      'CREATE TABLE IF NOT EXISTS "s"."t" (\n);'
    );
  });
});

describe('renderIndex', () => {
  it('guards plain and unique indexes', () => {
    expect(renderIndex('CREATE INDEX a_idx ON public.a USING btree (x)')).toBe(
      'CREATE INDEX IF NOT EXISTS a_idx ON public.a USING btree (x);'
    );
    expect(renderIndex('CREATE UNIQUE INDEX a_key ON public.a USING btree (x)')).toBe(
      'CREATE UNIQUE INDEX IF NOT EXISTS a_key ON public.a USING btree (x);'
    );
  });

  it('leaves an already guarded definition alone', () => {
    expect(renderIndex('CREATE INDEX IF NOT EXISTS a_idx ON public.a (x);')).toBe('CREATE INDEX IF NOT EXISTS a_idx ON public.a (x);');
  });
});

describe('emitPostDataScript', () => {
  it('adds constraints, indexes and the sequence anchors', () => {
    expect(emitPostDataScript(eventsSnapshot)).toBe(
      [
        'SET search_path TO "public";\n' +
          'ALTER TABLE "public"."events" ADD CONSTRAINT "events_pkey" PRIMARY KEY (id);\n' +
          'CREATE INDEX IF NOT EXISTS events_payload_idx ON public.events USING btree (payload);',
        'BEGIN;\n' +
          `${EVENTS_SETVAL}\n` +
          'ALTER SEQUENCE "public"."events_id_seq" OWNED BY "public"."events"."id";\n' +
          'COMMIT;',
      ].join('\n\n') + '\n'
    );
  });

  it('places foreign keys after every table section', () => {
    const orders: TableDefinition = {
      ref: { schemaName: 'sales', tableName: 'orders' },
      columns: [column('event_id')],
      constraints: [
        { name: 'orders_event_fk', kind: 'f', definition: 'FOREIGN KEY (event_id) REFERENCES public.events(id)' },
        { name: 'orders_event_key', kind: 'u', definition: 'UNIQUE (event_id)' },
      ],
      indexes: [],
    };
    expect(emitPostDataScript({ tables: [orders], sequences: [] })).toBe(
      [
        'SET search_path TO "sales";\nALTER TABLE "sales"."orders" ADD CONSTRAINT "orders_event_key" UNIQUE (event_id);',
        '-- foreign keys\n' +
          'SET search_path TO "sales";\n' +
          'ALTER TABLE "sales"."orders" ADD CONSTRAINT "orders_event_fk" FOREIGN KEY (event_id) REFERENCES public.events(id);',
      ].join('\n\n') + '\n'
    );
  });

  it('is empty when there is nothing to add', () => {
    const bare: TableDefinition = { ref: { schemaName: 'public', tableName: 'bare' }, columns: [column('n')], constraints: [], indexes: [] };
    expect(emitPostDataScript({ tables: [bare], sequences: [] })).toBe('');
  });
});

describe('emitSequenceAnchors', () => {
  it('anchors identity columns through pg_get_serial_sequence', () => {
    const table: TableDefinition = {
      ref: { schemaName: 'public', tableName: 't' },
      columns: [column('id', { identityKind: 'always' })],
      constraints: [],
      indexes: [],
    };
    const serial = `pg_catalog.pg_get_serial_sequence('"public"."t"', 'id')`;
    expect(emitSequenceAnchors({ tables: [table], sequences: [] })).toBe(
      'BEGIN;\n' +
        `SELECT pg_catalog.setval(${serial}, GREATEST((SELECT MAX("id") FROM "public"."t"), s.seqmin), ` +
        `EXISTS (SELECT 1 FROM "public"."t")) FROM pg_catalog.pg_sequence s WHERE s.seqrelid = ${serial}::regclass;\n` +
        'COMMIT;'
    );
  });

  it('anchors a sequence from another schema without claiming ownership', () => {
    const snapshot: SchemaSnapshot = {
      tables: [],
      sequences: [
        {
          reference: {
            sequenceSchema: 'public',
            sequenceName: 'global_seq',
            ownerTableSchema: 'sales',
            ownerTableName: 'orders',
            ownerColumnName: 'id',
          },
          options: null,
        },
      ],
    };

    expect(emitSequenceAnchors(snapshot)).toBe(
      'BEGIN;\n' +
        `SELECT pg_catalog.setval('"public"."global_seq"', GREATEST((SELECT MAX("id") FROM "sales"."orders"), m.min_value), ` +
        `EXISTS (SELECT 1 FROM "sales"."orders")) FROM pg_catalog.pg_sequences m ` +
        `WHERE m.schemaname = 'public' AND m.sequencename = 'global_seq';\n` +
        '-- "public"."global_seq" is used by "sales"."orders"."id" in another schema; left without OWNED BY\n' +
        'COMMIT;'
    );
  });

  it('returns an empty string without sequences or identity columns', () => {
    expect(emitSequenceAnchors({ tables: [], sequences: [] })).toBe('');
  });
});
