import { z } from 'zod';
import { MatchProcessor } from '../engine/match-processor';
import { createFirestoreSearchRunner } from '../engine/runners/firestore-runner';
import { SearchRunner } from '../engine/search';
import { EnrichConfig } from './config';
import { PolicyRegistry, PolicyType, SUPPORTED_POLICY_TYPES } from './policy';

export const MAX_MATCHES_LIMIT = 128;

export const enrichProcessorConfigSchema = z.object({
  tag: z.string().optional(),
  description: z.string().optional(),
  policy_name: z.string().min(1, 'policy_name must be a non-empty string.'),
  field: z.string().min(1, 'field must be a non-empty string.'),
  target_field: z.string().min(1, 'target_field must be a non-empty string.'),
  ignore_missing: z.boolean().default(false),
  override: z.boolean().default(true),
  max_matches: z.number().int().min(1).max(MAX_MATCHES_LIMIT).default(1),
});

export type EnrichProcessorConfig = z.input<typeof enrichProcessorConfigSchema>;

export interface CreateEnrichProcessorOptions {
  /**
   * Known policies. If omitted, uses EnrichConfig.policies.
   */
  policies?: PolicyRegistry;

  /**
   * Search capability the processor dispatches lookups to.
   * If omitted, searches Firestore through EnrichConfig.db.
   */
  searchRunner?: SearchRunner;
}

/**
 * Validates an enrich processor definition and builds the processor for its
 * policy type.
 *
 * @example
 * ```typescript
 * const processor = createEnrichProcessor(
 *   { policy_name: 'users', field: 'email', target_field: 'user', max_matches: 3 },
 *   { policies: { users: { type: 'match', indices: ['users'], matchField: 'email', enrichFields: ['name'] } } }
 * );
 * ```
 */
export function createEnrichProcessor(
  config: EnrichProcessorConfig,
  options: CreateEnrichProcessorOptions = {}
): MatchProcessor {
  const parsed = enrichProcessorConfigSchema.parse(config);
  const policies = options.policies ?? EnrichConfig.policies;

  const policy = policies[parsed.policy_name];
  if (!policy) {
    throw new Error(`policy [${parsed.policy_name}] does not exist`);
  }

  switch (policy.type) {
    case PolicyType.Match:
      return new MatchProcessor(options.searchRunner ?? createFirestoreSearchRunner(), {
        tag: parsed.tag,
        description: parsed.description,
        policyName: parsed.policy_name,
        field: parsed.field,
        targetField: parsed.target_field,
        matchField: policy.matchField,
        ignoreMissing: parsed.ignore_missing,
        overrideEnabled: parsed.override,
        maxMatches: parsed.max_matches,
      });
    case PolicyType.GeoMatch:
      throw new Error(`unsupported policy type [${policy.type}], supported types are [${SUPPORTED_POLICY_TYPES.join(', ')}]`);
    default:
      policy.type satisfies never;
      throw new Error('Unexpected policy type');
  }
}
