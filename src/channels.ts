import { LOG_CHANNELS, isConfigurableChannel } from './types';
import type { ChannelConfig, ChannelScope, ConfigurableChannel, HostEnvironment, LogChannel } from './types';

/**
 * Label describing a channel's effective state on the current host
 */
export type ChannelStatus = 'Disabled' | 'Active' | 'Editor Only' | 'Build Only';

/** Every channel except `Default`, in declaration order */
export const CONFIGURABLE_CHANNELS: readonly ConfigurableChannel[] = LOG_CHANNELS.filter(isConfigurableChannel);

/**
 * Default scope for a channel: Performance is editor-only, everything else logs everywhere.
 */
export function defaultScope(channel: LogChannel): ChannelScope {
  return channel === 'Performance' ? 'EditorOnly' : 'Both';
}

/**
 * Per-channel enable/scope policy, consulted before any emission.
 *
 * Fails open: without a configuration source, or without an entry for a
 * channel, the channel is enabled.
 */
export class ChannelRegistry {
  readonly host: HostEnvironment;
  private source: ChannelConfig[] | null;

  /**
   * @param configs - configuration source; `null` means none is attached
   */
  constructor(host: HostEnvironment, configs: readonly ChannelConfig[] | null = null) {
    this.host = host;
    this.source = configs ? configs.map((c) => ({ ...c })) : null;
  }

  get hasSource(): boolean {
    return this.source !== null;
  }

  isEnabled(channel: LogChannel): boolean {
    if (channel === 'Default') return true;
    if (!this.source) return true;

    const config = this.find(channel);
    if (!config) return true;
    if (!config.enabled) return false;

    return this.scopeMatchesHost(config.scope);
  }

  getConfig(channel: LogChannel): ChannelConfig | undefined {
    const config = this.find(channel);
    return config ? { ...config } : undefined;
  }

  /**
   * Copies of every configuration entry
   */
  configs(): ChannelConfig[] {
    return (this.source ?? []).map((c) => ({ ...c }));
  }

  setEnabled(channel: LogChannel, enabled: boolean): void {
    this.upsert(channel).enabled = enabled;
  }

  setScope(channel: LogChannel, scope: ChannelScope): void {
    this.upsert(channel).scope = scope;
  }

  setAllEnabled(enabled: boolean): void {
    for (const channel of CONFIGURABLE_CHANNELS) this.setEnabled(channel, enabled);
  }

  resetToDefaults(): void {
    this.source = CONFIGURABLE_CHANNELS.map((channel) => ({
      channel,
      scope: defaultScope(channel),
      enabled: true,
    }));
  }

  status(channel: LogChannel): ChannelStatus {
    const config = this.find(channel);
    const enabled = config?.enabled ?? true;
    const scope = config?.scope ?? 'Both';

    if (!enabled) return 'Disabled';
    if (this.scopeMatchesHost(scope)) return 'Active';
    return this.host === 'editor' ? 'Build Only' : 'Editor Only';
  }

  private scopeMatchesHost(scope: ChannelScope): boolean {
    if (scope === 'Both') return true;
    return this.host === 'editor' ? scope === 'EditorOnly' : scope === 'BuildOnly';
  }

  private find(channel: LogChannel): ChannelConfig | undefined {
    return this.source?.find((c) => c.channel === channel);
  }

  private upsert(channel: LogChannel): ChannelConfig {
    const source = this.source ?? (this.source = []);
    let config = source.find((c) => c.channel === channel);
    if (!config) {
      config = { channel, scope: 'Both', enabled: true };
      source.push(config);
    }
    return config;
  }
}
