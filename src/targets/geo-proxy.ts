import { readFile } from 'fs/promises';
import { ConfigurationError } from '../errors.js';
import { TargetDescriptor, ValidationRules } from '../types.js';

export const DEFAULT_REGIONS = ['na', 'eu', 'as'];

export const GEO_PROBE_RULES: ValidationRules = {
  metadataField: 'ip',
  errorFields: ['error'],
  resultFields: ['country'],
  envelopeFields: ['readme'],
};

export interface ProxyTemplates {
  /** e.g. `gate.{region}.proxy.example:9999` */
  host?: string;
  /** e.g. `customer-country-{country}:password` */
  auth?: string;
}

function fill(template: string, region: string, country: string): string {
  return template.replace(/\{region\}/g, region).replace(/\{country\}/g, country);
}

/** Proxy URL for a region/country pair, or undefined to go direct. */
export function buildProxyUrl(templates: ProxyTemplates, region: string, country = ''): string | undefined {
  if (!templates.host) {
    return undefined;
  }
  const host = fill(templates.host, region, country);
  if (!templates.auth) {
    return `http://${host}`;
  }

  const separator = templates.auth.indexOf(':');
  const user = fill(separator >= 0 ? templates.auth.slice(0, separator) : templates.auth, region, country);
  const password = separator >= 0 ? templates.auth.slice(separator + 1) : '';
  return `http://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}`;
}

export interface GeoProbeOptions {
  url: string;
  regions: readonly string[];
  countries?: readonly string[];
  templates: ProxyTemplates;
  requestCount?: number;
}

/** One target per region, or per region × country when countries are given. */
export function geoProbeTargets(options: GeoProbeOptions): TargetDescriptor[] {
  if (options.regions.length === 0) {
    throw new ConfigurationError('at least one proxy region is required');
  }
  const countries = options.countries && options.countries.length > 0 ? options.countries : [''];

  return options.regions.flatMap(region =>
    countries.map(country => {
      const proxy = buildProxyUrl(options.templates, region, country);
      return {
        id: country ? `${region}/${country}` : region,
        group: region,
        requestCount: options.requestCount,
        rules: GEO_PROBE_RULES,
        captureFields: ['ip', 'country'],
        buildRequest: () => ({
          url: options.url,
          headers: { accept: 'application/json' },
          proxy,
          label: country || region,
        }),
      };
    })
  );
}

export function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(/[,\s]+/)
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

/** Reads a country list (one per line or comma separated), dropping blanks and duplicates. */
export async function readCountriesFile(path: string): Promise<string[]> {
  const text = await readFile(path, 'utf-8');
  return [...new Set(parseList(text.replace(/^\uFEFF/, '')))];
}
