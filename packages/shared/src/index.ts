export { AppError, NotFoundError, ValidationError, ConflictError, isAppError } from './errors';
export type { ErrorDetail } from './errors';
export { generateUlid, isValidUlid, ulidTime } from './utils/ulid';
export { EventEnvelopeSchema } from './types/events';
export type { EventEnvelope } from './types/events';
export { parseOrThrow, hubIdPattern } from './validation';
export {
  KDS_URGENCY_LEVELS,
  kitchenSettingsSchema,
  DEFAULT_KITCHEN_SETTINGS,
} from './constants/kds-settings';
export type { KdsUrgency, KitchenSettings, KitchenSettingsInput } from './constants/kds-settings';
