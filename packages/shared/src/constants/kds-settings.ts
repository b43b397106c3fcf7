import { z } from 'zod';

/**
 * Kitchen display constants shared by the engine, the worker and any
 * display client.
 */

// ═══════════════════════════════════════════════════════════════════
// Urgency
// ═══════════════════════════════════════════════════════════════════

export const KDS_URGENCY_LEVELS = ['normal', 'warning', 'critical'] as const;
export type KdsUrgency = (typeof KDS_URGENCY_LEVELS)[number];

// ═══════════════════════════════════════════════════════════════════
// Per-hub settings
// ═══════════════════════════════════════════════════════════════════

/**
 * Per-hub kitchen configuration. Owned by the settings service; the
 * kitchen engine only ever reads it. Thresholds of zero or below switch
 * that urgency level off.
 */
export const kitchenSettingsSchema = z.object({
  // Escalation
  warningThresholdSeconds: z.number().int().default(900),
  criticalThresholdSeconds: z.number().int().default(1800),

  // Intake
  autoAcceptEnabled: z.boolean().default(false),

  // Auto-bump
  autoBumpEnabled: z.boolean().default(false),
  autoBumpDelaySeconds: z.number().int().min(0).default(300),
  autoBumpIntervalSeconds: z.number().int().min(1).max(3600).default(5),

  // Display
  showTimer: z.boolean().default(true),
  itemsPerPage: z.number().int().min(1).max(100).default(12),
  refreshIntervalSeconds: z.number().int().min(1).max(600).default(10),
  colorCodingEnabled: z.boolean().default(true),

  // Sound
  soundEnabled: z.boolean().default(true),
  soundOnNewOrder: z.boolean().default(true),
  soundOnRush: z.boolean().default(true),
});

export type KitchenSettings = z.output<typeof kitchenSettingsSchema>;
export type KitchenSettingsInput = z.input<typeof kitchenSettingsSchema>;

export const DEFAULT_KITCHEN_SETTINGS: KitchenSettings = kitchenSettingsSchema.parse({});
