import { z } from 'zod';

export const ENRICH_INDEX_NAME_BASE = '.enrich-';

export enum PolicyType {
  Match = 'match',
  GeoMatch = 'geo_match',
}

export const SUPPORTED_POLICY_TYPES = [PolicyType.Match] as const;

export const enrichPolicySchema = z.object({
  type: z.enum(PolicyType),
  indices: z.array(z.string().min(1)).min(1, 'Policy requires at least one source index.'),
  matchField: z.string().min(1, 'Policy match field must be a non-empty string.'),
  enrichFields: z.array(z.string().min(1)).min(1, 'Policy requires at least one enrich field.'),
});

export type EnrichPolicy = z.infer<typeof enrichPolicySchema>;

export const policyRegistrySchema = z.record(z.string(), enrichPolicySchema);

export type PolicyRegistry = z.infer<typeof policyRegistrySchema>;

/**
 * Name of the reference index an enrich policy is materialized into.
 * Whatever populates the index must use the same name.
 */
export function getEnrichIndexBaseName(policyName: string): string {
  return ENRICH_INDEX_NAME_BASE + policyName;
}
