import SemanticReleaseError from '@semantic-release/error';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A DQL statement and the values bound to its `:name` placeholders. The
 * args map is sent to the server as `query_args` and is omitted when the
 * statement has no placeholders.
 */
export interface Query {
  query: string;
  args?: Record<string, JsonValue>;
}

export type SortOrder = 'ASC' | 'DESC';

export interface SelectOptions {
  /** Maximum number of rows; ignored unless a positive integer. */
  limit?: number;
  /** Field to order by; no ORDER BY when empty. */
  sortBy?: string;
  /** "ASC" or "DESC" in any case; anything else keeps the server default. */
  sortOrder?: string;
}

/**
 * Minimal identifier sanitization for collection and field names: strips
 * backticks and turns spaces into underscores. It does not make arbitrary
 * input safe to splice into a statement.
 */
export function escapeIdent(s: string): string {
  return s.replace(/`/g, '').replace(/ /g, '_');
}

/**
 * Escape a value for use inside a double-quoted DQL string literal. Only
 * double quotes are escaped.
 */
export function escapeString(s: string): string {
  return s.replace(/"/g, '\\"');
}

export function normalizeSortOrder(order?: string): SortOrder | undefined {
  const upper = (order ?? '').toUpperCase();
  if (upper === 'ASC' || upper === 'DESC') {
    return upper;
  }
  return undefined;
}

const byKey = <T>([a]: [string, T], [b]: [string, T]): number =>
  a < b ? -1 : a > b ? 1 : 0;

function requireCollection(collection: string): void {
  if (collection.length === 0) {
    throw new SemanticReleaseError(
      'collection required',
      'EMISSINGCOLLECTION',
      'Every statement needs a target collection.',
    );
  }
}

function requireId(id: string): void {
  if (id.length === 0) {
    throw new SemanticReleaseError(
      'id required',
      'EMISSINGID',
      'Statements addressing a single record need its _id.',
    );
  }
}

/**
 * Build a SELECT over a collection:
 *
 *   SELECT * FROM c [WHERE f1 == "v1" AND ...] [ORDER BY f [ASC|DESC]] [LIMIT n]
 *
 * Filter values are inlined as string literals rather than bound, so every
 * filter compares against a string. Filters are emitted in key order.
 *
 * @param collection Collection name.
 * @param filters Exact-match field/value pairs.
 * @param options Limit and ordering.
 */
export function buildSelect(
  collection: string,
  filters: Record<string, string> = {},
  options: SelectOptions = {},
): string {
  const parts = [`SELECT * FROM ${escapeIdent(collection)}`];

  const clauses = Object.entries(filters)
    .sort(byKey)
    .map(([k, v]) => `${escapeIdent(k)} == "${escapeString(v)}"`);
  if (clauses.length > 0) {
    parts.push(`WHERE ${clauses.join(' AND ')}`);
  }

  if (options.sortBy) {
    const order = normalizeSortOrder(options.sortOrder);
    parts.push(
      order
        ? `ORDER BY ${escapeIdent(options.sortBy)} ${order}`
        : `ORDER BY ${escapeIdent(options.sortBy)}`,
    );
  }

  const limit = options.limit;
  if (typeof limit === 'number' && Number.isInteger(limit) && limit > 0) {
    parts.push(`LIMIT ${limit}`);
  }

  return parts.join(' ');
}

/**
 * Build an INSERT that binds the whole document as `:doc`. The document is
 * passed through untouched, whatever its shape.
 */
export function buildInsert(collection: string, doc: JsonObject): Query {
  requireCollection(collection);
  return {
    query: `INSERT INTO ${escapeIdent(collection)} DOCUMENTS (:doc)`,
    args: { doc },
  };
}

/**
 * Build an UPDATE that sets each patch field from its own bound parameter
 * and targets a single record through `:id`.
 *
 * A field `age` becomes `age = :p_age`. Parameter names go through the same
 * identifier sanitization as field names, so two keys that sanitize alike
 * (`last login` and `last_login`) are rejected.
 *
 * @throws SemanticReleaseError `EMISSINGCOLLECTION`, `EMISSINGID`,
 *   `EEMPTYPATCH` or `EDUPLICATEFIELD`.
 */
export function buildUpdate(
  collection: string,
  id: string,
  patch: JsonObject,
): Query {
  requireCollection(collection);
  requireId(id);

  const fields = Object.entries(patch).sort(byKey);
  if (fields.length === 0) {
    throw new SemanticReleaseError(
      'patch is empty',
      'EEMPTYPATCH',
      'An update needs at least one field to set.',
    );
  }

  const args: Record<string, JsonValue> = { id };
  const owners = new Map<string, string>();
  const sets = fields.map(([k, v]) => {
    const field = escapeIdent(k);
    const other = owners.get(field);
    if (other !== undefined) {
      throw new SemanticReleaseError(
        `patch keys "${other}" and "${k}" both set field ${field}`,
        'EDUPLICATEFIELD',
        'Each patch key must name a distinct field after sanitization.',
      );
    }
    owners.set(field, k);
    const param = `p_${field}`;
    args[param] = v;
    return `${field} = :${param}`;
  });

  return {
    query:
      `UPDATE ${escapeIdent(collection)} SET ${sets.join(', ')} ` +
      'WHERE _id == :id',
    args,
  };
}

export function buildGetRecord(collection: string, id: string): Query {
  requireCollection(collection);
  requireId(id);
  return {
    query: `SELECT * FROM ${escapeIdent(collection)} WHERE _id == :id LIMIT 1`,
    args: { id },
  };
}

// DELETE takes a single "=" on this server, unlike SELECT and UPDATE.
export function buildDeleteRecord(collection: string, id: string): Query {
  requireCollection(collection);
  requireId(id);
  return {
    query: `DELETE FROM ${escapeIdent(collection)} WHERE _id = :id`,
    args: { id },
  };
}

/**
 * Build a DELETE matching every identifier in a collection. DQL has no
 * TRUNCATE, so this uses a LIKE against a bound "%" pattern.
 */
export function buildDeleteAll(collection: string): Query {
  requireCollection(collection);
  return {
    query: `DELETE FROM ${escapeIdent(collection)} WHERE _id LIKE :pattern`,
    args: { pattern: '%' },
  };
}
