import { describe, it, expect } from '@jest/globals';
import SemanticReleaseError from '@semantic-release/error';
import {
  buildDeleteAll,
  buildDeleteRecord,
  buildGetRecord,
  buildInsert,
  buildSelect,
  buildUpdate,
  escapeIdent,
  escapeString,
  normalizeSortOrder,
} from '../src/query-builder.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return e instanceof SemanticReleaseError ? e.code : 'not-a-release-error';
  }
  return undefined;
}

describe('escaping', () => {
  it('escapeIdent strips backticks and replaces spaces', () => {
    expect(escapeIdent('my `table` name')).toBe('my_table_name');
    expect(escapeIdent('plain')).toBe('plain');
  });

  it('escapeString escapes only double quotes', () => {
    expect(escapeString('say "hi"')).toBe('say \\"hi\\"');
    expect(escapeString("it's \\ fine")).toBe("it's \\ fine");
  });

  it('normalizeSortOrder accepts ASC/DESC in any case', () => {
    expect(normalizeSortOrder('desc')).toBe('DESC');
    expect(normalizeSortOrder('Asc')).toBe('ASC');
    expect(normalizeSortOrder('sideways')).toBeUndefined();
    expect(normalizeSortOrder(undefined)).toBeUndefined();
  });
});

describe('buildSelect', () => {
  it('bare collection', () => {
    expect(buildSelect('users')).toBe('SELECT * FROM users');
  });

  it('filter, order and limit in that order', () => {
    expect(
      buildSelect(
        'users',
        { name: 'Alice' },
        { limit: 5, sortBy: 'age', sortOrder: 'DESC' },
      ),
    ).toBe('SELECT * FROM users WHERE name == "Alice" ORDER BY age DESC LIMIT 5');
  });

  it('emits multiple filters in key order', () => {
    expect(buildSelect('users', { role: 'admin', age: '30' })).toBe(
      'SELECT * FROM users WHERE age == "30" AND role == "admin"',
    );
  });

  it('sanitizes identifiers and escapes literal quotes', () => {
    expect(buildSelect('my `users`', { 'first name': 'say "hi"' })).toBe(
      'SELECT * FROM my_users WHERE first_name == "say \\"hi\\""',
    );
  });

  it('omits an unknown sort direction', () => {
    expect(buildSelect('users', {}, { sortBy: 'age', sortOrder: 'up' })).toBe(
      'SELECT * FROM users ORDER BY age',
    );
    expect(buildSelect('users', {}, { sortBy: 'age', sortOrder: 'asc' })).toBe(
      'SELECT * FROM users ORDER BY age ASC',
    );
  });

  it('ignores limits that are not positive integers', () => {
    expect(buildSelect('users', {}, { limit: 0 })).toBe('SELECT * FROM users');
    expect(buildSelect('users', {}, { limit: -3 })).toBe('SELECT * FROM users');
    expect(buildSelect('users', {}, { limit: 2.5 })).toBe(
      'SELECT * FROM users',
    );
  });
});

describe('buildInsert', () => {
  it('binds the document verbatim under :doc', () => {
    const doc = { name: 'Alice', tags: ['a', 'b'], meta: { seen: null } };
    const q = buildInsert('users', doc);
    expect(q.query).toBe('INSERT INTO users DOCUMENTS (:doc)');
    expect(Object.keys(q.args ?? {})).toEqual(['doc']);
    expect(q.args?.doc).toBe(doc);
  });

  it('binds an empty document too', () => {
    const doc = {};
    expect(buildInsert('users', doc).args).toEqual({ doc: {} });
  });

  it('rejects an empty collection', () => {
    expect(codeOf(() => buildInsert('', { a: 1 }))).toBe('EMISSINGCOLLECTION');
  });
});

describe('buildUpdate', () => {
  it('binds each field and the id', () => {
    expect(buildUpdate('users', 'u1', { age: 31 })).toEqual({
      query: 'UPDATE users SET age = :p_age WHERE _id == :id',
      args: { id: 'u1', p_age: 31 },
    });
  });

  it('orders SET clauses by field name', () => {
    const q = buildUpdate('users', 'u1', { name: 'Bob', age: 31 });
    expect(q.query).toBe(
      'UPDATE users SET age = :p_age, name = :p_name WHERE _id == :id',
    );
    expect(q.args).toEqual({ id: 'u1', p_age: 31, p_name: 'Bob' });
  });

  it('sanitizes field names into parameter names', () => {
    const q = buildUpdate('users', 'u1', { 'last login': '2024-01-01' });
    expect(q.query).toBe(
      'UPDATE users SET last_login = :p_last_login WHERE _id == :id',
    );
    expect(q.args).toEqual({ id: 'u1', p_last_login: '2024-01-01' });
  });

  it('rejects keys that sanitize to the same field', () => {
    expect(() =>
      buildUpdate('users', 'u1', { 'last login': 'a', last_login: 'b' }),
    ).toThrow(
      expect.objectContaining({
        code: 'EDUPLICATEFIELD',
        message: 'patch keys "last login" and "last_login" both set field last_login',
      }),
    );
    expect(codeOf(() => buildUpdate('users', 'u1', { '`age`': 1, age: 2 }))).toBe(
      'EDUPLICATEFIELD',
    );
  });

  it('validates collection, id and patch', () => {
    expect(codeOf(() => buildUpdate('', 'u1', { a: 1 }))).toBe(
      'EMISSINGCOLLECTION',
    );
    expect(codeOf(() => buildUpdate('users', '', { a: 1 }))).toBe(
      'EMISSINGID',
    );
    expect(codeOf(() => buildUpdate('users', 'u1', {}))).toBe('EEMPTYPATCH');
    expect(codeOf(() => buildUpdate('', '', {}))).toBe('EMISSINGCOLLECTION');
  });
});

describe('single-record and bulk statements', () => {
  it('buildGetRecord', () => {
    expect(buildGetRecord('users', 'u1')).toEqual({
      query: 'SELECT * FROM users WHERE _id == :id LIMIT 1',
      args: { id: 'u1' },
    });
    expect(codeOf(() => buildGetRecord('users', ''))).toBe('EMISSINGID');
  });

  it('buildDeleteRecord', () => {
    expect(buildDeleteRecord('users', 'u1')).toEqual({
      query: 'DELETE FROM users WHERE _id = :id',
      args: { id: 'u1' },
    });
    expect(codeOf(() => buildDeleteRecord('', 'u1'))).toBe(
      'EMISSINGCOLLECTION',
    );
  });

  it('buildDeleteAll matches every id', () => {
    expect(buildDeleteAll('users')).toEqual({
      query: 'DELETE FROM users WHERE _id LIKE :pattern',
      args: { pattern: '%' },
    });
    expect(codeOf(() => buildDeleteAll(''))).toBe('EMISSINGCOLLECTION');
  });
});
