import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { TargetDescriptor, ValidationRules } from '../types.js';

const EngineSchema = z
  .object({
    name: z.string().min(1),
    category: z.string().default('search'),
    query: z.string().optional(),
    queryParam: z.string().default('q'),
    params: z.record(z.string()).optional(),
  })
  .refine(engine => engine.query !== undefined || engine.params !== undefined, {
    message: 'engine needs a query or params',
  });

const CatalogueSchema = z.object({
  engines: z.array(EngineSchema).min(1),
});

export type SerpEngine = z.infer<typeof EngineSchema>;

export const DEFAULT_ENGINES_FILE = new URL('../../data/serp-engines.json', import.meta.url);

export const SERP_RULES: ValidationRules = {
  metadataField: 'search_metadata',
  metadataStatusField: 'status',
  metadataErrorStatus: 'error',
  metadataErrorField: 'error',
  errorFields: ['error'],
  resultFields: [
    'organic_results',
    'inline_images',
    'local_results',
    'shopping_results',
    'jobs_results',
    'news_results',
    'video_results',
    'answer_box',
    'knowledge_graph',
  ],
  envelopeFields: ['search_metadata', 'search_parameters', 'search_information', 'pagination', 'serpapi_pagination'],
};

export function parseSerpEngines(json: unknown): SerpEngine[] {
  const result = CatalogueSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid engine catalogue at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return result.data.engines;
}

export function loadSerpEngines(file: URL | string = DEFAULT_ENGINES_FILE): SerpEngine[] {
  return parseSerpEngines(JSON.parse(readFileSync(file, 'utf-8')));
}

/**
 * Picks engines by name, in the order given. Names missing from the
 * catalogue get a plain `q=test` query so any engine can still be probed.
 */
export function selectEngines(catalogue: readonly SerpEngine[], names?: readonly string[]): SerpEngine[] {
  if (!names || names.length === 0) {
    return [...catalogue];
  }
  const byName = new Map(catalogue.map(engine => [engine.name, engine]));
  return names.map(
    name => byName.get(name) ?? { name, category: 'custom', query: 'test', queryParam: 'q' }
  );
}

export function buildSerpParams(engine: SerpEngine, apiKey: string, token: string): Record<string, string> {
  const params: Record<string, string> = {
    api_key: apiKey,
    engine: engine.name,
    no_cache: 'true',
  };
  if (engine.params) {
    Object.assign(params, engine.params);
  }
  if (engine.query !== undefined) {
    params[engine.queryParam] = engine.query;
  }
  params.timestamp = token;
  return params;
}

export interface SerpTargetOptions {
  apiKey: string;
  baseUrl: string;
  engines: readonly SerpEngine[];
  requestCount?: number;
}

export function serpTargets(options: SerpTargetOptions): TargetDescriptor[] {
  return options.engines.map(engine => ({
    id: engine.name,
    group: engine.category,
    requestCount: options.requestCount,
    rules: SERP_RULES,
    buildRequest: ({ token }) => {
      const params = buildSerpParams(engine, options.apiKey, token);
      const url = new URL(options.baseUrl);
      for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, value);
      }
      const { api_key: _redacted, ...visible } = params;
      return {
        url: url.toString(),
        headers: { accept: 'application/json' },
        label: JSON.stringify(visible),
      };
    },
  }));
}
