import { and, eq } from 'drizzle-orm';
import { getDb, kdsSettings, kdsStations } from '@kitchenflow/db';
import type { Database } from '@kitchenflow/db';
import { logger } from '@kitchenflow/core';
import { DEFAULT_KITCHEN_SETTINGS, kitchenSettingsSchema } from '@kitchenflow/shared';
import type { KitchenSettings } from '@kitchenflow/shared';
import type { SettingsProvider } from '../settings';
import type { StationDirectory } from '../stations';
import type { Station } from '../types';
import { toStorageFailure } from './row-mappers';

export class DrizzleStationDirectory implements StationDirectory {
  constructor(private readonly resolveDb: () => Database = getDb) {}

  async getStation(hubId: string, stationId: string): Promise<Station | null> {
    try {
      const [row] = await this.resolveDb()
        .select({
          id: kdsStations.id,
          hubId: kdsStations.hubId,
          name: kdsStations.name,
          isActive: kdsStations.isActive,
        })
        .from(kdsStations)
        .where(and(eq(kdsStations.id, stationId), eq(kdsStations.hubId, hubId)))
        .limit(1);
      return row ?? null;
    } catch (err) {
      throw toStorageFailure('getStation', err);
    }
  }
}

/**
 * Reads the hub's settings row. A hub without a row, or with a row that no
 * longer validates, runs on defaults.
 */
export class DrizzleSettingsProvider implements SettingsProvider {
  constructor(private readonly resolveDb: () => Database = getDb) {}

  async getSettings(hubId: string): Promise<KitchenSettings> {
    let stored: Record<string, unknown> | undefined;
    try {
      const [row] = await this.resolveDb()
        .select({ settings: kdsSettings.settings })
        .from(kdsSettings)
        .where(eq(kdsSettings.hubId, hubId))
        .limit(1);
      stored = row?.settings;
    } catch (err) {
      throw toStorageFailure('getSettings', err);
    }
    if (!stored) return DEFAULT_KITCHEN_SETTINGS;

    const parsed = kitchenSettingsSchema.safeParse(stored);
    if (!parsed.success) {
      logger.warn('Invalid kitchen settings row, using defaults', {
        hubId,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return DEFAULT_KITCHEN_SETTINGS;
    }
    return parsed.data;
  }
}
