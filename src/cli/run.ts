import { Command, InvalidArgumentError } from 'commander';
import * as admin from 'firebase-admin';
import { readFile } from 'node:fs/promises';
import { EnrichConfig } from '../api/config';
import { PolicyRegistry, policyRegistrySchema, PolicyType } from '../api/policy';
import { createEnrichProcessor } from '../api/processor-factory';
import { IngestDocument } from '../document/ingest-document';
import { createFirestoreSearchRunner } from '../engine/runners/firestore-runner';
import { createMemorySearchRunner, MemoryIndices } from '../engine/runners/memory-runner';
import { SearchRunner } from '../engine/search';

interface RunOptions {
  policy: string;
  field: string;
  targetField: string;
  matchField?: string;
  policies?: string;
  maxMatches: number;
  ignoreMissing: boolean;
  override: boolean;
  document: string;
  reference?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function loadPolicies(options: RunOptions): Promise<PolicyRegistry> {
  if (options.policies) {
    return policyRegistrySchema.parse(await readJson(options.policies));
  }
  if (!options.matchField) {
    throw new Error('Either --policies or --match-field is required.');
  }
  return {
    [options.policy]: {
      type: PolicyType.Match,
      indices: [options.policy],
      matchField: options.matchField,
      enrichFields: [options.matchField],
    },
  };
}

async function loadSearchRunner(options: RunOptions): Promise<SearchRunner> {
  if (options.reference) {
    const reference = await readJson(options.reference);
    if (!isRecord(reference)) {
      throw new Error(`Reference file ${options.reference} must contain an object of index names to records.`);
    }
    const indices: MemoryIndices = {};
    for (const [index, records] of Object.entries(reference)) {
      indices[index] = Array.isArray(records) ? records.filter(isRecord) : [];
    }
    return createMemorySearchRunner(indices);
  }

  if (admin.apps.length === 0) {
    admin.initializeApp();
  }
  EnrichConfig.setDb(admin.firestore());
  return createFirestoreSearchRunner();
}

export function createEnrichProgram(): Command {
  const program = new Command();

  program
    .name('match-enrich')
    .description('Enrich JSON documents with records from a reference index');

  program
    .command('run')
    .description('Enrich one document and print it')
    .requiredOption('--policy <name>', 'Enrich policy name')
    .requiredOption('--field <path>', 'Path of the lookup key in the document')
    .requiredOption('--target-field <path>', 'Path the matched records are written to')
    .requiredOption('--document <path>', 'JSON file holding the document')
    .option('--match-field <field>', 'Field of the reference index to match on')
    .option('--policies <path>', 'JSON file of policy definitions keyed by name')
    .option('--max-matches <n>', 'Maximum number of records to merge', parsePositiveInt, 1)
    .option('--ignore-missing', 'Pass documents without the lookup key through unchanged', false)
    .option('--no-override', 'Keep an existing target field')
    .option(
      '--reference <path>',
      'JSON file mapping index names to records (searches Firestore when omitted)'
    )
    .action(async (options: RunOptions) => {
      const policies = await loadPolicies(options);
      const searchRunner = await loadSearchRunner(options);
      const processor = createEnrichProcessor(
        {
          policy_name: options.policy,
          field: options.field,
          target_field: options.targetField,
          ignore_missing: options.ignoreMissing,
          override: options.override,
          max_matches: options.maxMatches,
        },
        { policies, searchRunner }
      );

      const source = await readJson(options.document);
      if (!isRecord(source)) {
        throw new Error(`Document file ${options.document} must contain a JSON object.`);
      }
      const document = await processor.processAsync(new IngestDocument(source));

      console.log(JSON.stringify(document, null, 2));
    });

  return program;
}

export async function runEnrichCli(argv: string[]): Promise<void> {
  await createEnrichProgram().parseAsync(argv);
}
