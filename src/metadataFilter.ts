/**
 * Metadata Filter Compiler
 *
 * Turns a flat list of metadata conditions into parameterized SQL predicates
 * over documents.doc_metadata (jsonb) and resolves them to a document-id
 * allow-list against the canonical store.
 *
 * Result contract:
 *   null  -> no conditions, search is unrestricted
 *   []    -> conditions matched no document, search must match nothing
 *
 * All conditions share one logical operator; nested groups are not supported.
 */

import { errors } from './errors';
import type { KnowledgeStore } from './knowledgeStore';
import type { ComparisonOperator, LogicalOperator, MetadataCondition, MetadataConditionItem } from './schemas';
import { logInfo } from './utils';

// =============================================================================
// Predicate Model
// =============================================================================

export type RangeOperator = '<' | '>' | '<=' | '>=';

export type FilterPredicate =
  | { kind: 'contains'; field: string; value: string }
  | { kind: 'notContains'; field: string; value: string }
  | { kind: 'startsWith'; field: string; value: string }
  | { kind: 'endsWith'; field: string; value: string }
  | { kind: 'equals'; field: string; value: string | number }
  | { kind: 'notEquals'; field: string; value: string | number }
  | { kind: 'empty'; field: string }
  | { kind: 'notEmpty'; field: string }
  | { kind: 'range'; field: string; op: RangeOperator; value: number };

export interface MetadataFilter {
  logicalOperator: LogicalOperator;
  predicates: FilterPredicate[];
}

export interface CompiledMetadataFilter {
  /** Parenthesized boolean expression, placeholders numbered from startIndex */
  clause: string;
  values: unknown[];
}

function assertNever(value: never): never {
  throw new Error(`Unhandled metadata predicate: ${JSON.stringify(value)}`);
}

function requireValue(item: MetadataConditionItem): string | number {
  if (item.value === null || item.value === undefined) {
    throw errors.validation(`Metadata condition "${item.name}" with operator "${item.comparison_operator}" requires a value`);
  }
  return item.value;
}

function requireText(item: MetadataConditionItem): string {
  return String(requireValue(item));
}

function requireNumber(item: MetadataConditionItem): number {
  const raw = requireValue(item);
  const num = typeof raw === 'number' ? raw : raw.trim() === '' ? NaN : Number(raw.trim());
  if (!Number.isFinite(num)) {
    throw errors.validation(`Metadata condition "${item.name}" with operator "${item.comparison_operator}" requires a numeric value`);
  }
  return num;
}

/**
 * Normalize one condition into its predicate kind.
 * Adding an operator to ComparisonOperator fails to compile until handled here.
 */
export function toPredicate(item: MetadataConditionItem): FilterPredicate {
  const field = item.name;
  const op: ComparisonOperator = item.comparison_operator;

  switch (op) {
    case 'contains':
      return { kind: 'contains', field, value: requireText(item) };
    case 'not contains':
      return { kind: 'notContains', field, value: requireText(item) };
    case 'start with':
      return { kind: 'startsWith', field, value: requireText(item) };
    case 'end with':
      return { kind: 'endsWith', field, value: requireText(item) };
    case 'is':
    case '=':
      return { kind: 'equals', field, value: requireValue(item) };
    case 'is not':
    case '≠':
      return { kind: 'notEquals', field, value: requireValue(item) };
    case 'empty':
      return { kind: 'empty', field };
    case 'not empty':
      return { kind: 'notEmpty', field };
    case 'before':
    case '<':
      return { kind: 'range', field, op: '<', value: requireNumber(item) };
    case 'after':
    case '>':
      return { kind: 'range', field, op: '>', value: requireNumber(item) };
    case '≤':
    case '<=':
      return { kind: 'range', field, op: '<=', value: requireNumber(item) };
    case '≥':
    case '>=':
      return { kind: 'range', field, op: '>=', value: requireNumber(item) };
    default:
      return assertNever(op);
  }
}

/**
 * Build the predicate list for a request's metadata condition.
 * Pure; throws VALIDATION_ERROR for unusable values so callers can run it
 * before touching any store.
 */
export function buildMetadataFilter(condition: MetadataCondition | null | undefined): MetadataFilter | null {
  if (!condition || condition.conditions.length === 0) return null;
  return {
    logicalOperator: condition.logical_operator,
    predicates: condition.conditions.map(toPredicate),
  };
}

// =============================================================================
// SQL Compilation
// =============================================================================

/** Escape LIKE wildcards so user text matches literally (ESCAPE '\') */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** Metadata text that casts to double precision: sign, fraction and exponent forms */
export const NUMERIC_TEXT_PATTERN = '^[-+]?([0-9]+(\\.[0-9]*)?|\\.[0-9]+)([eE][-+]?[0-9]+)?$';

class ParamList {
  readonly values: unknown[] = [];
  constructor(private readonly startIndex: number) {}

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.startIndex + this.values.length - 1}`;
  }
}

function textOf(key: string): string {
  return `(doc_metadata ->> ${key})`;
}

// Non-numeric text yields NULL, so the row simply fails the comparison
function numberOf(key: string): string {
  return `(CASE WHEN ${textOf(key)} ~ '${NUMERIC_TEXT_PATTERN}' THEN ${textOf(key)}::double precision END)`;
}

function compilePredicate(pred: FilterPredicate, params: ParamList): string {
  switch (pred.kind) {
    case 'contains': {
      const key = params.add(pred.field);
      return `${textOf(key)} LIKE ${params.add(`%${escapeLikePattern(pred.value)}%`)} ESCAPE '\\'`;
    }
    case 'notContains': {
      const key = params.add(pred.field);
      return `${textOf(key)} NOT LIKE ${params.add(`%${escapeLikePattern(pred.value)}%`)} ESCAPE '\\'`;
    }
    case 'startsWith': {
      const key = params.add(pred.field);
      return `${textOf(key)} LIKE ${params.add(`${escapeLikePattern(pred.value)}%`)} ESCAPE '\\'`;
    }
    case 'endsWith': {
      const key = params.add(pred.field);
      return `${textOf(key)} LIKE ${params.add(`%${escapeLikePattern(pred.value)}`)} ESCAPE '\\'`;
    }
    case 'equals':
    case 'notEquals': {
      const key = params.add(pred.field);
      const sqlOp = pred.kind === 'equals' ? '=' : '<>';
      if (typeof pred.value === 'number') {
        return `${numberOf(key)} ${sqlOp} ${params.add(pred.value)}::double precision`;
      }
      // Strings compare as quoted JSON scalars
      return `(doc_metadata -> ${key}) ${sqlOp} ${params.add(JSON.stringify(pred.value))}::jsonb`;
    }
    case 'empty':
      return `${textOf(params.add(pred.field))} IS NULL`;
    case 'notEmpty':
      return `${textOf(params.add(pred.field))} IS NOT NULL`;
    case 'range': {
      const key = params.add(pred.field);
      return `${numberOf(key)} ${pred.op} ${params.add(pred.value)}::double precision`;
    }
    default:
      return assertNever(pred);
  }
}

/**
 * Compile predicates into one parenthesized clause.
 * Placeholders start at `startIndex` so the caller can bind its own leading params.
 */
export function compileMetadataFilter(filter: MetadataFilter, startIndex = 1): CompiledMetadataFilter {
  const params = new ParamList(startIndex);
  const parts = filter.predicates.map((p) => `(${compilePredicate(p, params)})`);
  const joiner = filter.logicalOperator === 'and' ? ' AND ' : ' OR ';
  return { clause: `(${parts.join(joiner)})`, values: params.values };
}

// =============================================================================
// Allow-list Resolution
// =============================================================================

/**
 * Resolve a metadata filter to the document ids it admits.
 * Returns null when there is nothing to filter on.
 */
export async function resolveDocumentIdsFilter(
  store: Pick<KnowledgeStore, 'findDocumentIdsByMetadata'>,
  datasetId: string,
  filter: MetadataFilter | null
): Promise<string[] | null> {
  if (!filter) return null;

  const ids = await store.findDocumentIdsByMetadata(datasetId, filter);
  logInfo('Metadata filter resolved', {
    datasetId,
    conditionCount: filter.predicates.length,
    logicalOperator: filter.logicalOperator,
    matchedDocuments: ids.length,
  });
  return ids;
}
