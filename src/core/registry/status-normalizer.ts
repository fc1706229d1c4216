import { PaymentStatus, isCanonicalStatus } from '../domain/enums';
import statusMap from './data/status-map.json';

/**
 * Provider-native tokens grouped by the canonical state they map to
 */
export type StatusMappingTable = Partial<Record<PaymentStatus, string[]>>;

/**
 * Status Normalizer
 *
 * Maps provider status vocabulary onto the four canonical states.
 * Provider tables are consulted before the default table. Tokens nobody
 * knows come back lower-cased, so an unseen status never breaks a caller.
 */
export class StatusNormalizer {
  private defaultTable: StatusMappingTable = {};
  private readonly providerTables = new Map<string, StatusMappingTable>();

  private defaultLookup = new Map<string, PaymentStatus>();
  private readonly providerLookups = new Map<string, Map<string, PaymentStatus>>();

  constructor(options: { withBuiltInMappings?: boolean } = {}) {
    if (options.withBuiltInMappings !== false) {
      this.registerDefaultMappings(statusMap.defaults);
      for (const [provider, table] of Object.entries(statusMap.providers)) {
        this.registerProviderMappings(provider, table);
      }
    }
  }

  /**
   * Normalize a provider status. Total and idempotent.
   */
  normalize(status: string, provider?: string): string {
    const trimmed = status.trim();
    if (isCanonicalStatus(trimmed)) {
      return trimmed;
    }

    const token = trimmed.toUpperCase();

    if (provider) {
      const providerMatch = this.providerLookups.get(provider.toLowerCase())?.get(token);
      if (providerMatch) {
        return providerMatch;
      }
    }

    return this.defaultLookup.get(token) ?? trimmed.toLowerCase();
  }

  /**
   * Add provider-specific tokens; merged with anything registered before
   */
  registerProviderMappings(provider: string, mappings: StatusMappingTable): this {
    const key = provider.toLowerCase();
    const merged = mergeTables(this.providerTables.get(key) ?? {}, mappings);

    this.providerTables.set(key, merged);
    this.providerLookups.set(key, buildLookup(merged));
    return this;
  }

  /**
   * Extend the default table
   */
  registerDefaultMappings(mappings: StatusMappingTable): this {
    this.defaultTable = mergeTables(this.defaultTable, mappings);
    this.defaultLookup = buildLookup(this.defaultTable);
    return this;
  }

  getDefaultMappings(): StatusMappingTable {
    return cloneTable(this.defaultTable);
  }

  getProviderMappings(provider: string): StatusMappingTable;
  getProviderMappings(): Record<string, StatusMappingTable>;
  getProviderMappings(
    provider?: string,
  ): StatusMappingTable | Record<string, StatusMappingTable> {
    if (provider !== undefined) {
      return cloneTable(this.providerTables.get(provider.toLowerCase()) ?? {});
    }

    const all: Record<string, StatusMappingTable> = {};
    for (const [name, table] of this.providerTables) {
      all[name] = cloneTable(table);
    }
    return all;
  }
}

function mergeTables(base: StatusMappingTable, extra: StatusMappingTable): StatusMappingTable {
  const merged = cloneTable(base);

  for (const status of Object.values(PaymentStatus)) {
    const tokens = extra[status];
    if (!tokens?.length) {
      continue;
    }
    const existing = new Set(merged[status] ?? []);
    for (const token of tokens) {
      existing.add(token.trim().toUpperCase());
    }
    merged[status] = [...existing];
  }

  return merged;
}

function buildLookup(table: StatusMappingTable): Map<string, PaymentStatus> {
  const lookup = new Map<string, PaymentStatus>();

  for (const status of Object.values(PaymentStatus)) {
    for (const token of table[status] ?? []) {
      lookup.set(token.toUpperCase(), status);
    }
  }

  return lookup;
}

function cloneTable(table: StatusMappingTable): StatusMappingTable {
  const copy: StatusMappingTable = {};
  for (const status of Object.values(PaymentStatus)) {
    const tokens = table[status];
    if (tokens) {
      copy[status] = [...tokens];
    }
  }
  return copy;
}
