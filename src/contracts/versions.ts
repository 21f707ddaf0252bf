export const ENGINE_VERSION = 'enclosure-thermal-1.0.0' as const;
export const CONTRACT_VERSION = 'v1' as const;
