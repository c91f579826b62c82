/** Zod Validation Schemas - Centralized request/backend validation */

import { z } from 'zod';
import { RETRIEVAL_MAX_QUERY_LENGTH } from './config';

// === Common ===
export const DatasetIdParamSchema = z.object({ datasetId: z.string().min(1, 'Dataset ID is required').max(64) });
export type DatasetIdParam = z.infer<typeof DatasetIdParamSchema>;

// === Metadata Filter ===
export const COMPARISON_OPERATORS = [
  'contains', 'not contains', 'start with', 'end with',
  'is', '=', 'is not', '≠',
  'empty', 'not empty',
  'before', '<', 'after', '>', '≤', '<=', '≥', '>=',
] as const;
export const ComparisonOperatorSchema = z.enum(COMPARISON_OPERATORS);
export type ComparisonOperator = z.infer<typeof ComparisonOperatorSchema>;

export const LogicalOperatorSchema = z.enum(['and', 'or']);
export type LogicalOperator = z.infer<typeof LogicalOperatorSchema>;

export const MetadataConditionItemSchema = z.object({
  name: z.string().min(1, 'Metadata field name is required').max(255),
  comparison_operator: ComparisonOperatorSchema,
  value: z.union([z.string().max(1000), z.number().finite()]).nullable().optional(),
});
export type MetadataConditionItem = z.infer<typeof MetadataConditionItemSchema>;

export const MetadataConditionSchema = z.object({
  logical_operator: LogicalOperatorSchema.nullish().transform(v => v ?? 'or'),
  conditions: z.array(MetadataConditionItemSchema).max(50).default([]),
});
export type MetadataCondition = z.infer<typeof MetadataConditionSchema>;

// === Retrieval ===
export const RetrievalSettingSchema = z.object({
  top_k: z.number().int('top_k must be an integer').positive('top_k must be a positive integer').max(100).optional(),
  score_threshold: z.number().finite().min(0).max(1).optional(),
});
export type RetrievalSetting = z.infer<typeof RetrievalSettingSchema>;

export const DatasetRetrieveSchema = z.object({
  query: z.string()
    .min(1, 'Query is required')
    .max(RETRIEVAL_MAX_QUERY_LENGTH, `Query cannot exceed ${RETRIEVAL_MAX_QUERY_LENGTH} characters`),
  retrieval_setting: RetrievalSettingSchema.nullish(),
  metadata_condition: MetadataConditionSchema.nullish(),
});
export type DatasetRetrieveInput = z.infer<typeof DatasetRetrieveSchema>;

export const RetrievalRequestSchema = DatasetRetrieveSchema.extend({
  knowledge_id: z.string().min(1, 'knowledge_id is required').max(64),
});
export type RetrievalRequestInput = z.infer<typeof RetrievalRequestSchema>;

// === Vector Backends ===
const required = (name: string) => z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);

export const AnalyticdbConfigSchema = z.object({
  host: required('ANALYTICDB_HOST'),
  port: z.number().int().positive(),
  account: required('ANALYTICDB_ACCOUNT'),
  password: required('ANALYTICDB_PASSWORD'),
  namespace: required('ANALYTICDB_NAMESPACE').regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'ANALYTICDB_NAMESPACE must be a plain identifier'),
  minConnection: z.number().int().min(1, 'ANALYTICDB_MIN_CONNECTION should be greater than 0'),
  maxConnection: z.number().int().min(1),
}).refine(c => c.minConnection <= c.maxConnection, {
  message: 'ANALYTICDB_MIN_CONNECTION should be less than or equal to ANALYTICDB_MAX_CONNECTION',
  path: ['minConnection'],
});
export type AnalyticdbConfig = z.infer<typeof AnalyticdbConfigSchema>;

export const MilvusConfigSchema = z.object({
  uri: required('MILVUS_URI').url('MILVUS_URI must be a URL'),
  token: z.string().optional(),
  user: z.string().optional(),
  password: z.string().optional(),
  database: z.string().min(1).default('default'),
  enableHybridSearch: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(30000),
}).refine(c => !!c.token || (!!c.user && !!c.password), {
  message: 'MILVUS_TOKEN or MILVUS_USER and MILVUS_PASSWORD are required',
  path: ['token'],
});
export type MilvusConfig = z.infer<typeof MilvusConfigSchema>;

export const DistanceMetricSchema = z.enum(['COSINE', 'DOT_PRODUCT', 'SQUARED_L2']);
export type DistanceMetric = z.infer<typeof DistanceMetricSchema>;

export const VertexConfigSchema = z.object({
  projectId: required('GOOGLE_CLOUD_PROJECT'),
  region: required('VERTEX_VECTOR_SEARCH_REGION'),
  indexEndpointResource: required('VERTEX_INDEX_ENDPOINT_RESOURCE')
    .regex(/^projects\/[^/]+\/locations\/[^/]+\/indexEndpoints\/[^/]+$/, 'VERTEX_INDEX_ENDPOINT_RESOURCE must be a full resource name'),
  deployedIndexId: required('VERTEX_DEPLOYED_INDEX_ID'),
  distanceMetric: DistanceMetricSchema.default('COSINE'),
});
export type VertexConfig = z.infer<typeof VertexConfigSchema>;

/** Persisted backend identification stored on the dataset row */
export const IndexStructSchema = z.object({
  type: z.string().min(1),
  vector_store: z.object({ class_prefix: z.string().min(1) }),
});
export type IndexStruct = z.infer<typeof IndexStructSchema>;
