import { DEFAULT_CHANNELS, PaymentChannel } from '../domain/enums';
import channelMap from './data/channel-map.json';

/**
 * Returned when the provider takes no channel list at all; the caller
 * leaves the field out of the outgoing payload.
 */
export const OMIT_CHANNELS: unique symbol = Symbol('payments.channels.omit');

export type ChannelMappingResult = string[] | typeof OMIT_CHANNELS;

export type ChannelMappingFunction = (channels: string[]) => ChannelMappingResult;

/**
 * Declarative channel table, one per provider in channel-map.json
 */
export interface ChannelTable {
  /** Provider does not accept a channel list */
  omit: boolean;
  /** Case applied to tokens missing from `mapping`: lower | upper | preserve */
  case: string;
  mapping: Record<string, string>;
  /** Accepted provider tokens; empty accepts anything */
  valid: string[];
  defaults: string[];
}

const builtInTables: Record<string, ChannelTable> = channelMap;

/**
 * Channel Mapper
 *
 * Translates canonical channels into each provider's vocabulary through
 * an explicit provider → mapping function registry.
 */
export class ChannelMapper {
  private readonly mappings = new Map<string, ChannelMappingFunction>();
  private readonly defaults = new Map<string, string[]>();
  private readonly channelless = new Set<string>();

  constructor(options: { withBuiltInMappings?: boolean } = {}) {
    if (options.withBuiltInMappings !== false) {
      for (const [provider, table] of Object.entries(builtInTables)) {
        this.registerTable(provider, table);
      }
    }
  }

  /**
   * Map canonical channels for a provider.
   * Null or empty input, or a provider without channel support, yields OMIT_CHANNELS.
   */
  mapChannels(channels: readonly string[] | null | undefined, provider: string): ChannelMappingResult {
    if (!channels || channels.length === 0) {
      return OMIT_CHANNELS;
    }

    const mapping = this.mappings.get(provider.toLowerCase());
    if (!mapping) {
      return [...channels];
    }

    const mapped = mapping([...channels]);
    if (mapped === OMIT_CHANNELS) {
      return OMIT_CHANNELS;
    }

    const unique = [...new Set(mapped.filter((channel) => channel.length > 0))];
    return unique.length > 0 ? unique : OMIT_CHANNELS;
  }

  /**
   * Register or replace a provider's mapping function
   */
  registerMapping(provider: string, mapping: ChannelMappingFunction): this {
    const key = provider.toLowerCase();
    this.mappings.set(key, mapping);
    this.channelless.delete(key);
    return this;
  }

  /**
   * Register a declarative table (same shape as channel-map.json entries)
   */
  registerTable(provider: string, table: ChannelTable): this {
    const key = provider.toLowerCase();

    if (table.omit) {
      this.mappings.set(key, () => OMIT_CHANNELS);
      this.channelless.add(key);
    } else {
      this.registerMapping(key, createTableMapping(table));
    }

    this.defaults.set(key, [...table.defaults]);
    return this;
  }

  /**
   * Whether the provider accepts a channel list on charge
   */
  supportsChannels(provider: string): boolean {
    const key = provider.toLowerCase();
    return this.mappings.has(key) && !this.channelless.has(key);
  }

  getDefaultChannels(provider: string): string[] {
    return [...(this.defaults.get(provider.toLowerCase()) ?? [PaymentChannel.CARD])];
  }

  isValidChannel(channel: string): boolean {
    return DEFAULT_CHANNELS.some((known) => known === channel.toLowerCase());
  }

  static getUnifiedChannels(): PaymentChannel[] {
    return [...DEFAULT_CHANNELS];
  }
}

function applyCase(token: string, mode: string): string {
  switch (mode) {
    case 'upper':
      return token.toUpperCase();
    case 'lower':
      return token.toLowerCase();
    default:
      return token;
  }
}

function createTableMapping(table: ChannelTable): ChannelMappingFunction {
  const valid = new Set(table.valid);

  return (channels) =>
    channels
      .map((channel) => table.mapping[channel.toLowerCase()] ?? applyCase(channel, table.case))
      .filter((token) => valid.size === 0 || valid.has(token));
}
