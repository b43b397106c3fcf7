import { kitchenSettingsSchema, parseOrThrow } from '@kitchenflow/shared';
import type { KitchenSettings, KitchenSettingsInput } from '@kitchenflow/shared';

/** Read-only view of per-hub kitchen configuration. */
export interface SettingsProvider {
  getSettings(hubId: string): Promise<KitchenSettings>;
}

/**
 * Settings held in process: schema defaults, overlaid with shared
 * defaults, overlaid with per-hub overrides.
 */
export class StaticSettingsProvider implements SettingsProvider {
  private readonly resolved = new Map<string, KitchenSettings>();
  private readonly fallback: KitchenSettings;

  constructor(
    private readonly overrides: Readonly<Record<string, KitchenSettingsInput>> = {},
    defaults: KitchenSettingsInput = {},
  ) {
    this.fallback = parseOrThrow(kitchenSettingsSchema, defaults, 'Invalid kitchen settings');
  }

  async getSettings(hubId: string): Promise<KitchenSettings> {
    const cached = this.resolved.get(hubId);
    if (cached) return cached;
    const hubOverrides = this.overrides[hubId];
    const settings = hubOverrides
      ? parseOrThrow(
          kitchenSettingsSchema,
          { ...this.fallback, ...hubOverrides },
          `Invalid kitchen settings for ${hubId}`,
        )
      : this.fallback;
    this.resolved.set(hubId, settings);
    return settings;
  }
}
