export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function qualifiedName(schema: string, name: string): string {
  return `${quoteIdent(schema)}.${quoteIdent(name)}`;
}

export function normalizeTableFqn(fqn: string): { schema: string; table: string; identifier: string } {
  const parts = fqn.trim().split('.');
  if (parts.length === 1 && parts[0]) {
    return { schema: 'public', table: parts[0], identifier: qualifiedName('public', parts[0]) };
  }
  if (parts.length === 2 && parts[0] && parts[1]) {
    const [schema, table] = parts;
    return { schema, table, identifier: qualifiedName(schema, table) };
  }
  throw new Error(`Invalid table FQN: ${fqn}. Expected table or schema.table.`);
}
