/**
 * Metadata Filter Compiler Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  buildMetadataFilter,
  compileMetadataFilter,
  escapeLikePattern,
  NUMERIC_TEXT_PATTERN,
  resolveDocumentIdsFilter,
  toPredicate,
  MetadataFilter,
} from './metadataFilter';
import { ApiError } from './errors';
import type { KnowledgeStore } from './knowledgeStore';

const NUMERIC = (key: string) =>
  `(CASE WHEN (doc_metadata ->> ${key}) ~ '^[-+]?([0-9]+(\\.[0-9]*)?|\\.[0-9]+)([eE][-+]?[0-9]+)?$' THEN (doc_metadata ->> ${key})::double precision END)`;

function isValidationError(err: unknown): boolean {
  return err instanceof ApiError && err.code === 'VALIDATION_ERROR';
}

describe('toPredicate', () => {
  it('maps operator aliases onto the same predicate', () => {
    assert.deepStrictEqual(toPredicate({ name: 'year', comparison_operator: '≥', value: 2020 }), { kind: 'range', field: 'year', op: '>=', value: 2020 });
    assert.deepStrictEqual(toPredicate({ name: 'year', comparison_operator: '>=', value: 2020 }), { kind: 'range', field: 'year', op: '>=', value: 2020 });
    assert.deepStrictEqual(toPredicate({ name: 'ts', comparison_operator: 'before', value: 100 }), { kind: 'range', field: 'ts', op: '<', value: 100 });
    assert.deepStrictEqual(toPredicate({ name: 'ts', comparison_operator: 'after', value: 100 }), { kind: 'range', field: 'ts', op: '>', value: 100 });
    assert.deepStrictEqual(toPredicate({ name: 'lang', comparison_operator: 'is', value: 'en' }), { kind: 'equals', field: 'lang', value: 'en' });
    assert.deepStrictEqual(toPredicate({ name: 'lang', comparison_operator: '≠', value: 'en' }), { kind: 'notEquals', field: 'lang', value: 'en' });
  });

  it('ignores the value for empty checks', () => {
    assert.deepStrictEqual(toPredicate({ name: 'owner', comparison_operator: 'empty', value: null }), { kind: 'empty', field: 'owner' });
    assert.deepStrictEqual(toPredicate({ name: 'owner', comparison_operator: 'not empty' }), { kind: 'notEmpty', field: 'owner' });
  });

  it('casts numeric text for range comparisons', () => {
    assert.deepStrictEqual(toPredicate({ name: 'pages', comparison_operator: '<', value: ' 42 ' }), { kind: 'range', field: 'pages', op: '<', value: 42 });
  });

  it('rejects a non-numeric range value', () => {
    assert.throws(() => toPredicate({ name: 'pages', comparison_operator: '<', value: 'many' }), isValidationError);
    assert.throws(() => toPredicate({ name: 'pages', comparison_operator: '>=', value: '' }), isValidationError);
  });

  it('rejects a missing value for substring operators', () => {
    assert.throws(() => toPredicate({ name: 'title', comparison_operator: 'contains', value: null }), isValidationError);
    assert.throws(() => toPredicate({ name: 'title', comparison_operator: 'start with' }), isValidationError);
  });

  it('accepts the empty string as a comparison value', () => {
    assert.deepStrictEqual(toPredicate({ name: 'tag', comparison_operator: '=', value: '' }), { kind: 'equals', field: 'tag', value: '' });
    assert.deepStrictEqual(toPredicate({ name: 'tag', comparison_operator: 'is not', value: '' }), { kind: 'notEquals', field: 'tag', value: '' });
    assert.deepStrictEqual(toPredicate({ name: 'tag', comparison_operator: 'contains', value: '' }), { kind: 'contains', field: 'tag', value: '' });
  });
});

describe('buildMetadataFilter', () => {
  it('returns null when there is nothing to filter on', () => {
    assert.strictEqual(buildMetadataFilter(null), null);
    assert.strictEqual(buildMetadataFilter(undefined), null);
    assert.strictEqual(buildMetadataFilter({ logical_operator: 'and', conditions: [] }), null);
  });

  it('keeps the declared logical operator', () => {
    const filter = buildMetadataFilter({
      logical_operator: 'and',
      conditions: [{ name: 'lang', comparison_operator: '=', value: 'en' }],
    });
    assert.deepStrictEqual(filter, {
      logicalOperator: 'and',
      predicates: [{ kind: 'equals', field: 'lang', value: 'en' }],
    });
  });
});

describe('escapeLikePattern', () => {
  it('escapes wildcards and the escape character', () => {
    assert.strictEqual(escapeLikePattern('50%_off\\x'), '50\\%\\_off\\\\x');
  });
});

describe('compileMetadataFilter', () => {
  it('compiles substring predicates with escaped LIKE patterns', () => {
    const filter: MetadataFilter = {
      logicalOperator: 'or',
      predicates: [{ kind: 'contains', field: 'title', value: '50%_off' }],
    };
    const compiled = compileMetadataFilter(filter, 2);
    assert.strictEqual(compiled.clause, "(((doc_metadata ->> $2) LIKE $3 ESCAPE '\\'))");
    assert.deepStrictEqual(compiled.values, ['title', '%50\\%\\_off%']);
  });

  it('anchors prefix and suffix patterns', () => {
    const compiled = compileMetadataFilter({
      logicalOperator: 'or',
      predicates: [
        { kind: 'startsWith', field: 'code', value: 'HR' },
        { kind: 'endsWith', field: 'file', value: '.pdf' },
        { kind: 'notContains', field: 'title', value: 'draft' },
      ],
    });
    assert.strictEqual(
      compiled.clause,
      "(((doc_metadata ->> $1) LIKE $2 ESCAPE '\\') OR ((doc_metadata ->> $3) LIKE $4 ESCAPE '\\') OR ((doc_metadata ->> $5) NOT LIKE $6 ESCAPE '\\'))"
    );
    assert.deepStrictEqual(compiled.values, ['code', 'HR%', 'file', '%.pdf', 'title', '%draft%']);
  });

  it('compares strings as JSON scalars and guards numeric casts', () => {
    const compiled = compileMetadataFilter({
      logicalOperator: 'and',
      predicates: [
        { kind: 'equals', field: 'category', value: 'guide' },
        { kind: 'range', field: 'year', op: '>=', value: 2020 },
      ],
    });
    assert.strictEqual(
      compiled.clause,
      `(((doc_metadata -> $1) = $2::jsonb) AND (${NUMERIC('$3')} >= $4::double precision))`
    );
    assert.deepStrictEqual(compiled.values, ['category', '"guide"', 'year', 2020]);
  });

  it('compares an empty string as the quoted JSON scalar', () => {
    const compiled = compileMetadataFilter({ logicalOperator: 'or', predicates: [{ kind: 'equals', field: 'tag', value: '' }] });
    assert.strictEqual(compiled.clause, '(((doc_metadata -> $1) = $2::jsonb))');
    assert.deepStrictEqual(compiled.values, ['tag', '""']);
  });

  it('compiles numeric inequality and presence checks', () => {
    const compiled = compileMetadataFilter({
      logicalOperator: 'or',
      predicates: [
        { kind: 'notEquals', field: 'version', value: 3 },
        { kind: 'empty', field: 'owner' },
        { kind: 'notEmpty', field: 'reviewer' },
      ],
    });
    assert.strictEqual(
      compiled.clause,
      `((${NUMERIC('$1')} <> $2::double precision) OR ((doc_metadata ->> $3) IS NULL) OR ((doc_metadata ->> $4) IS NOT NULL))`
    );
    assert.deepStrictEqual(compiled.values, ['version', 3, 'owner', 'reviewer']);
  });
});

describe('NUMERIC_TEXT_PATTERN', () => {
  const numeric = new RegExp(NUMERIC_TEXT_PATTERN);

  it('accepts sign, fraction and exponent forms', () => {
    for (const text of ['42', '-3.5', '+5', '.5', '5.', '1e3', '2.5E-2']) {
      assert.strictEqual(numeric.test(text), true, text);
    }
  });

  it('rejects text that does not cast to a number', () => {
    for (const text of ['', '-', '.', 'abc', '1.2.3', '1e', '12px']) {
      assert.strictEqual(numeric.test(text), false, text);
    }
  });
});

describe('resolveDocumentIdsFilter', () => {
  function storeReturning(ids: string[]) {
    const calls: Array<[string, MetadataFilter]> = [];
    const store: Pick<KnowledgeStore, 'findDocumentIdsByMetadata'> = {
      async findDocumentIdsByMetadata(datasetId, filter) {
        calls.push([datasetId, filter]);
        return ids;
      },
    };
    return { store, calls };
  }

  it('returns null without querying when there is no filter', async () => {
    const { store, calls } = storeReturning(['doc-1']);
    assert.strictEqual(await resolveDocumentIdsFilter(store, 'ds-1', null), null);
    assert.strictEqual(calls.length, 0);
  });

  it('returns an explicit empty allow-list when nothing matches', async () => {
    const { store } = storeReturning([]);
    const filter: MetadataFilter = { logicalOperator: 'or', predicates: [{ kind: 'empty', field: 'owner' }] };
    assert.deepStrictEqual(await resolveDocumentIdsFilter(store, 'ds-1', filter), []);
  });

  it('passes the dataset scope through to the store', async () => {
    const { store, calls } = storeReturning(['doc-1', 'doc-2']);
    const filter: MetadataFilter = { logicalOperator: 'and', predicates: [{ kind: 'notEmpty', field: 'owner' }] };
    assert.deepStrictEqual(await resolveDocumentIdsFilter(store, 'ds-9', filter), ['doc-1', 'doc-2']);
    assert.deepStrictEqual(calls, [['ds-9', filter]]);
  });
});
