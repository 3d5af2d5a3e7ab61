/**
 * Default values applied to a server when a field is omitted on create.
 */
export const ServerDefaults = {
  IP_ADDRESS: '0.0.0.0',
  DESCRIPTION: 'no_description',
  IS_ACTIVE: false,
} as const;

export const ServerLimits = {
  NAME_MAX_LENGTH: 255,
  DESCRIPTION_MAX_LENGTH: 255,
} as const;

// Health probe status values
export const HealthStatusValues = {
  OK: 'ok',
  SHUTTING_DOWN: 'shutting_down',
  READY: 'ready',
  NOT_READY: 'not_ready',
} as const;

export type HealthStatus = typeof HealthStatusValues[keyof typeof HealthStatusValues];
