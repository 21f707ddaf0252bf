export const THERMAL_FLAG_IDS = {
  // Environment
  AMBIENT_AT_LIMIT: 'environment.ambient_at_limit',
  SOLAR_PUSHES_OVER_LIMIT: 'environment.solar_over_limit',

  // Ventilation
  VENTILATION_IGNORED_SMALL: 'ventilation.ignored_small_enclosure',
  VENTILATION_IGNORED_IP: 'ventilation.ignored_ip_rating',
  VENTILATION_WHAT_IF: 'ventilation.what_if',
  VENTILATION_RECOMMENDED: 'ventilation.recommended',

  // Geometry / curves
  CURVE_INPUT_CLAMPED: 'curves.input_clamped',
  PARTITIONS_BEYOND_TABLE: 'geometry.partitions_beyond_table',

  // Cooling
  MATERIAL_DISSIPATION_DISABLED: 'cooling.material_dissipation_disabled',
  ACTIVE_COOLING_REQUIRED: 'cooling.active_required',
} as const;

export type ThermalFlagId = typeof THERMAL_FLAG_IDS[keyof typeof THERMAL_FLAG_IDS];
